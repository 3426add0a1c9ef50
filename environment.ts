// environment.ts

export const env = {
  development: "development",
  test: "test",
  production: "production",
} as const;

export type EnvironmentName = (typeof env)[keyof typeof env];

export const amendmentTrackerConfig = {
  projectName: "Amendment Tracker",
  version: "1.0.0",
};

const resolveEnvironment = (value: string | undefined): EnvironmentName => {
  if (value === env.production) return env.production;
  if (value === env.test) return env.test;
  return env.development;
};

export default resolveEnvironment(process.env.NODE_ENV);
