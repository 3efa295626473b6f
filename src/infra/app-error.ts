export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/** Request payload failed shape or domain validation; never scored. */
export class InvalidInputError extends AppError {
  constructor(code: string, message: string, statusCode = 422) {
    super(statusCode, code, message);
    this.name = "InvalidInputError";
  }
}

/** Startup configuration is unusable. Fatal: the process must not start. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(500, "invalid_runtime_config", message);
    this.name = "ConfigurationError";
  }
}
