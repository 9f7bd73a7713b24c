export type CaptionErrorCode =
  | 'PERMISSION_DENIED'
  | 'DEVICE_UNAVAILABLE'
  | 'CREDENTIAL_FAILED'
  | 'TRANSIENT_DISPATCH'
  | 'INVALID_TRANSITION';

export class CaptionError extends Error {
  constructor(
    message: string,
    readonly code: CaptionErrorCode,
    readonly retriable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class PermissionError extends CaptionError {
  constructor(message = 'Microphone access was denied', options?: { cause?: unknown }) {
    super(message, 'PERMISSION_DENIED', true, options);
  }
}

export class DeviceUnavailableError extends CaptionError {
  constructor(message = 'No microphone is available', options?: { cause?: unknown }) {
    super(message, 'DEVICE_UNAVAILABLE', true, options);
  }
}

export class CredentialError extends CaptionError {
  constructor(message = 'Could not obtain a recognition credential', options?: { cause?: unknown }) {
    super(message, 'CREDENTIAL_FAILED', true, options);
  }
}

export class TransientDispatchError extends CaptionError {
  constructor(readonly sequence: number, message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSIENT_DISPATCH', true, options);
  }
}

export class InvalidTransitionError extends CaptionError {
  constructor(readonly command: string, readonly state: string) {
    super(`Cannot ${command} while ${state}`, 'INVALID_TRANSITION', false);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
