/**
 * Custom error classes
 */

export class PlayerError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    public readonly originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PlayerError';
    this.timestamp = new Date();
    this.context = context;
    Object.setPrototypeOf(this, PlayerError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging/debugging
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * The backend could not open or start a track (unreadable or unsupported file)
 */
export class LoadError extends PlayerError {
  constructor(
    message: string,
    public readonly path: string,
    originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'LOAD_ERROR', originalError, { path, ...context });
    this.name = 'LoadError';
    Object.setPrototypeOf(this, LoadError.prototype);
  }
}

export class PlaylistError extends PlayerError {
  constructor(message: string, originalError?: unknown, context?: Record<string, unknown>) {
    super(message, 'PLAYLIST_ERROR', originalError, context);
    this.name = 'PlaylistError';
    Object.setPrototypeOf(this, PlaylistError.prototype);
  }
}

export class ValidationError extends PlayerError {
  constructor(
    message: string,
    public readonly validationErrors?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', validationErrors, context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
