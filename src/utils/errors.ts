/**
 * Error hierarchy
 *
 * Only ConfigError is fatal. Every other error is caught at the boundary of
 * the component that raised it and turned into an empty, dropped or fallback
 * result.
 */

export class DigestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DigestError';
  }
}

export class ConfigError extends DigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class SourceUnavailableError extends DigestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_UNAVAILABLE', details);
    this.name = 'SourceUnavailableError';
  }
}

export type GenerationErrorKind = 'timeout' | 'transport' | 'malformed';

export class GenerationError extends DigestError {
  constructor(
    message: string,
    public readonly kind: GenerationErrorKind,
    details?: Record<string, unknown>
  ) {
    super(message, 'GENERATION_ERROR', { kind, ...details });
    this.name = 'GenerationError';
  }
}

export class DeliveryError extends DigestError {
  constructor(
    message: string,
    public readonly status?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'DELIVERY_ERROR', { status, ...details });
    this.name = 'DeliveryError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
