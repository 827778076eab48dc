/** Machine-readable error kinds surfaced to tool callers and HTTP clients. */
export type RelayErrorKind = 'validation' | 'not_found';

export class RelayError extends Error {
  constructor(
    message: string,
    public readonly kind: RelayErrorKind,
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

/** Empty channel or sender on write, or a malformed fetch cursor. No state was changed. */
export class ValidationError extends RelayError {
  constructor(message: string) {
    super(message, 'validation');
    this.name = 'ValidationError';
  }
}

/** Fetch against a channel name the registry has never seen. */
export class NotFoundError extends RelayError {
  constructor(message: string) {
    super(message, 'not_found');
    this.name = 'NotFoundError';
  }
}
