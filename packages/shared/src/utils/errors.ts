export class LogloomError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LogloomError';
  }
}

export class ConfigurationError extends LogloomError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[] = [],
  ) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class PayloadDecodeError extends LogloomError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[] = [],
    cause?: Error,
  ) {
    super(message, 'PAYLOAD_DECODE_ERROR', cause);
    this.name = 'PayloadDecodeError';
  }
}

/** Timeouts and retryable statuses; the batch is worth another attempt as-is. */
export class TransientIndexError extends LogloomError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, 'TRANSIENT_INDEX_ERROR', cause);
    this.name = 'TransientIndexError';
  }
}

/** The request never produced a status: the client must reconnect first. */
export class IndexConnectionError extends LogloomError {
  constructor(message: string, cause?: Error) {
    super(message, 'INDEX_CONNECTION_ERROR', cause);
    this.name = 'IndexConnectionError';
  }
}

export class IndexRequestError extends LogloomError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, 'INDEX_REQUEST_ERROR', cause);
    this.name = 'IndexRequestError';
  }
}

export class MessagingError extends LogloomError {
  constructor(message: string, cause?: Error) {
    super(message, 'MESSAGING_ERROR', cause);
    this.name = 'MessagingError';
  }
}

export class StateStoreError extends LogloomError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[] = [],
    cause?: Error,
  ) {
    super(message, 'STATE_STORE_ERROR', cause);
    this.name = 'StateStoreError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
