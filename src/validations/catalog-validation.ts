import { z } from "zod";

const optionalText = (max: number) => z.string().max(max).nullish();

export const v_create_employee = z.object({
  employeeName: z.string().trim().min(1, "Employee name is required").max(100),
  initials: optionalText(10),
  email: z.string().email().max(255).nullish(),
  windowsLogin: optionalText(100),
  isActive: z.boolean().optional(),
});

export const v_update_employee = v_create_employee.partial();

export const v_employee_query = z.object({
  active: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
});

export const v_create_application = z.object({
  applicationName: z.string().trim().min(1, "Application name is required").max(100),
  description: z.string().nullish(),
  isActive: z.boolean().optional(),
});

export const v_update_application = v_create_application.partial();

export const v_create_application_version = z.object({
  version: z.string().trim().min(1, "Version is required").max(50),
  releasedDate: z.coerce.date().nullish(),
  notes: z.string().nullish(),
  isActive: z.boolean().optional(),
});

export type CreateEmployeeInput = z.infer<typeof v_create_employee>;
export type UpdateEmployeeInput = z.infer<typeof v_update_employee>;
export type CreateApplicationInput = z.infer<typeof v_create_application>;
export type UpdateApplicationInput = z.infer<typeof v_update_application>;
export type CreateApplicationVersionInput = z.infer<typeof v_create_application_version>;
