export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly setting?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a remote capability or classifier cannot be reached at all
 * (connection refused, timeout). Reported failures travel as
 * `success: false` responses instead.
 */
export class CapabilityInvocationError extends Error {
  constructor(
    message: string,
    public readonly capability: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CapabilityInvocationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
