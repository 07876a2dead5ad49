/**
 * Error types for the tagged limiter package
 */

/**
 * Base error class for limiter errors
 */
export class LimiterError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LimiterError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Invalid limiter, runner or configuration file settings
 */
export class ConfigurationError extends LimiterError {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }> = [],
    cause?: Error
  ) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Work handed to a runner that no longer accepts it
 */
export class RunnerShutdownError extends LimiterError {
  constructor(message = 'Task runner has been shut down') {
    super(message, 'RUNNER_SHUTDOWN');
    this.name = 'RunnerShutdownError';
  }
}
