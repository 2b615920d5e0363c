export class AppError extends Error {
  public code: string;
  public details?: unknown[];
  public isOperational: boolean;

  constructor(message: string, code: string, details?: unknown[]) {
    super(message);
    this.code = code;
    this.details = details;
    this.isOperational = true;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown[]) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string = 'Invalid report configuration', details?: unknown[]) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class ReportSinkError extends AppError {
  public readonly reportLabel: string;
  public cause: unknown;

  constructor(reportLabel: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Report sink rejected report "${reportLabel}": ${reason}`, 'REPORT_SINK_ERROR');
    this.name = 'ReportSinkError';
    this.reportLabel = reportLabel;
    this.cause = cause;
  }
}
