import { BaseLogger } from "./base-logger";

class ErrorLoggerClass extends BaseLogger {
  constructor(filename: string) {
    super(filename, "error");
  }

  write(err: unknown, context?: Record<string, unknown>) {
    if (err instanceof Error) {
      this.logger.error(err.message, { name: err.name, stack: err.stack, ...context });
      return;
    }
    this.logger.error(String(err), context);
  }
}

const ErrorLogger = new ErrorLoggerClass("error");
export default ErrorLogger;
