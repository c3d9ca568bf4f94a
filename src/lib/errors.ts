/**
 * Base error class for all template errors
 */
export class TemplateError extends Error {
  public readonly templateName: string | undefined;

  constructor(
    message: string,
    public readonly code: string,
    templateName?: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(templateName ? `[Template: ${templateName}] ${message}` : message);
    this.name = "TemplateError";
    this.templateName = templateName || undefined;
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      templateName: this.templateName,
      context: this.context,
    };
  }
}

/**
 * Error for invalid template options
 */
export class ConfigError extends TemplateError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", undefined, context);
    this.name = "ConfigError";
  }
}
