export class FleetError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'FleetError';
  }
}

export class ConfigError extends FleetError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class GenerationError extends FleetError {
  constructor(
    message: string,
    public readonly deviceId: string,
    public readonly kind: string,
    cause?: Error,
  ) {
    super(message, 'GENERATION_ERROR', 'generate', cause);
    this.name = 'GenerationError';
  }
}

export class TransportError extends FleetError {
  constructor(message: string, public readonly status?: number, cause?: Error) {
    super(message, 'TRANSPORT_ERROR', 'send', cause);
    this.name = 'TransportError';
  }
}

export class ReplayError extends FleetError {
  constructor(message: string, cause?: Error) {
    super(message, 'REPLAY_ERROR', 'replay', cause);
    this.name = 'ReplayError';
  }
}

/** Normalize an unknown thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
