/**
 * Error codes carried by every error the node raises.
 */
export type NodeErrorCode =
  | 'MALFORMED'
  | 'DISPATCH_FAILED'
  | 'SOURCE_UNAVAILABLE'
  | 'BIND_FAILED'
  | 'REGISTRATION_FAILED'
  | 'INVALID_STATE'
  | 'SEND_FAILED'
  | 'INVALID_CONFIG';

/**
 * Base error class for the node.
 *
 * Check `code` for programmatic handling; `cause` holds the underlying
 * socket, fetch or handler error where there is one.
 */
export class NodeError extends Error {
  declare readonly code: NodeErrorCode;

  override cause?: unknown;

  constructor(message: string, code: NodeErrorCode, options?: { cause?: unknown }) {
    super(message);
    this.name = 'NodeError';
    this.code = code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, NodeError.prototype);
  }
}

export type DecodeFailure =
  | 'truncated'
  | 'misaligned'
  | 'invalid-address'
  | 'unknown-type-tag'
  | 'malformed'
  | 'non-canonical';

/**
 * A datagram that does not parse as an OSC message or bundle.
 */
export class DecodeError extends NodeError {
  declare readonly code: 'MALFORMED';

  readonly reason: DecodeFailure;

  constructor(reason: DecodeFailure, detail: string) {
    super(`Malformed OSC packet (${reason}): ${detail}`, 'MALFORMED');
    this.name = 'DecodeError';
    this.reason = reason;
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * A handler failed while processing a message.
 */
export class DispatchError extends NodeError {
  declare readonly code: 'DISPATCH_FAILED';

  readonly address: string;

  constructor(address: string, message: string, options?: { cause?: unknown }) {
    super(message, 'DISPATCH_FAILED', options);
    this.name = 'DispatchError';
    this.address = address;
    Object.setPrototypeOf(this, DispatchError.prototype);
  }
}

/**
 * The sensor source could not produce a sample.
 */
export class SourceUnavailable extends NodeError {
  declare readonly code: 'SOURCE_UNAVAILABLE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SOURCE_UNAVAILABLE', options);
    this.name = 'SourceUnavailable';
    Object.setPrototypeOf(this, SourceUnavailable.prototype);
  }
}

/**
 * A UDP socket could not be bound. Fatal at startup.
 */
export class BindError extends NodeError {
  declare readonly code: 'BIND_FAILED';

  readonly port: number;

  constructor(port: number, options?: { cause?: unknown }) {
    super(`Unable to bind UDP port ${port}: ${describeError(options?.cause)}`, 'BIND_FAILED', options);
    this.name = 'BindError';
    this.port = port;
    Object.setPrototypeOf(this, BindError.prototype);
  }
}

export class RegistrationError extends NodeError {
  declare readonly code: 'REGISTRATION_FAILED';

  constructor(message: string) {
    super(message, 'REGISTRATION_FAILED');
    this.name = 'RegistrationError';
    Object.setPrototypeOf(this, RegistrationError.prototype);
  }
}

export class StateError extends NodeError {
  declare readonly code: 'INVALID_STATE';

  constructor(message: string) {
    super(message, 'INVALID_STATE');
    this.name = 'StateError';
    Object.setPrototypeOf(this, StateError.prototype);
  }
}

export class SendError extends NodeError {
  declare readonly code: 'SEND_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SEND_FAILED', options);
    this.name = 'SendError';
    Object.setPrototypeOf(this, SendError.prototype);
  }
}

export class ConfigError extends NodeError {
  declare readonly code: 'INVALID_CONFIG';

  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Render an unknown thrown value for log metadata.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
