/**
 * Base application error. All domain-specific errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "SESSION_START_FAILED")
 * - `statusCode`    HTTP-compatible status code for API responses
 * - `isOperational` true = expected/recoverable, false = programmer error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.timestamp = new Date().toISOString();

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      ...(process.env['NODE_ENV'] !== 'production' ? { stack: this.stack } : {}),
    };
  }
}

/**
 * The browser could not be launched or the session could not be created.
 * Fatal to starting a run; the loop never enters `running`.
 */
export class SessionStartError extends AppError {
  public readonly profileDir: string;

  constructor(message: string, profileDir: string, statusCode = 503) {
    super(message, 'SESSION_START_FAILED', statusCode);
    this.profileDir = profileDir;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      profileDir: this.profileDir,
    };
  }
}

/**
 * A single click/type/select on a page element failed.
 */
export class InteractionError extends AppError {
  public readonly action: string;

  constructor(message: string, action: string, statusCode = 500) {
    super(message, 'INTERACTION_FAILED', statusCode);
    this.action = action;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      action: this.action,
    };
  }
}

/**
 * A query against the page raised (stale element, detached frame, closed page).
 */
export class InspectionError extends AppError {
  public readonly query: string;

  constructor(message: string, query: string, statusCode = 500) {
    super(message, 'INSPECTION_FAILED', statusCode);
    this.query = query;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      query: this.query,
    };
  }
}

/**
 * Neither the response profile nor the question's options hold a candidate
 * answer. Profiles are validated up front so this should only surface at
 * configuration time.
 */
export class EmptyAnswerPoolError extends AppError {
  public readonly pool: string;
  public readonly profileName?: string;

  constructor(message: string, pool: string, profileName?: string, statusCode = 422) {
    super(message, 'EMPTY_ANSWER_POOL', statusCode);
    this.pool = pool;
    this.profileName = profileName;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      pool: this.pool,
      profileName: this.profileName,
    };
  }
}

export class ValidationError extends AppError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(
    message: string,
    field: string,
    value?: unknown,
    statusCode = 422,
  ) {
    super(message, 'VALIDATION_ERROR', statusCode);
    this.field = field;
    this.value = value;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      value: this.value,
    };
  }
}

/**
 * The requested operation is not allowed in the runner's current state.
 */
export class RunStateError extends AppError {
  public readonly status: string;

  constructor(message: string, status: string, statusCode = 409) {
    super(message, 'INVALID_RUN_STATE', statusCode);
    this.status = status;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
    };
  }
}

/**
 * Message text of an unknown thrown value, for log fields.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
