// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Error kinds raised or reported by the dispatch core.
 *
 * Recovered locally (connection stays open):
 * - VALIDATION: malformed or unrecognized inbound payload
 * - HANDLER: uncaught exception from handler body
 * - ROUTING: event with no matching handler or failing validation
 *
 * Fatal:
 * - CONSTRUCTION: inconsistent registry at startup
 *
 * Propagated to the caller:
 * - TRANSPORT: channel-layer primitive failed
 * - STATE: operation attempted in the wrong connection state
 */
export enum ErrorCode {
  /** Malformed or unrecognized inbound payload */
  VALIDATION = "VALIDATION",

  /** Uncaught exception from a handler body */
  HANDLER = "HANDLER",

  /** Event with no matching handler or failing validation */
  ROUTING = "ROUTING",

  /** Duplicate discriminators or contradictory declarations */
  CONSTRUCTION = "CONSTRUCTION",

  /** Channel-layer primitive failure */
  TRANSPORT = "TRANSPORT",

  /** Illegal connection state transition or operation */
  STATE = "STATE",
}

export type ErrorCodeValue = `${ErrorCode}`;

/**
 * Handling metadata per error kind.
 */
export interface ErrorCodeMetadata {
  /** Whether the dispatch loop recovers and keeps serving the connection */
  recoverable: boolean;

  /** Whether the client is told about it (error frame) */
  reportedToClient: boolean | "unicast-only";

  /** Human-readable description of this error kind */
  description: string;
}

export const ERROR_CODE_META: Record<ErrorCode, ErrorCodeMetadata> = {
  [ErrorCode.VALIDATION]: {
    recoverable: true,
    reportedToClient: true,
    description: "Inbound payload failed validation",
  },
  [ErrorCode.HANDLER]: {
    recoverable: true,
    reportedToClient: true,
    description: "Handler raised an exception",
  },
  [ErrorCode.ROUTING]: {
    recoverable: true,
    reportedToClient: "unicast-only",
    description: "Event could not be routed",
  },
  [ErrorCode.CONSTRUCTION]: {
    recoverable: false,
    reportedToClient: false,
    description: "Handler registry is inconsistent",
  },
  [ErrorCode.TRANSPORT]: {
    recoverable: false,
    reportedToClient: false,
    description: "Channel layer operation failed",
  },
  [ErrorCode.STATE]: {
    recoverable: false,
    reportedToClient: false,
    description: "Operation not allowed in the current connection state",
  },
};

/**
 * One validation issue, in the wire shape sent inside error frames.
 */
export interface ErrorDetail {
  /** Issue kind, e.g. "missing", "invalid_type", "unknown_discriminator" */
  type: string;

  /** Path to the offending value, starting at the frame root */
  loc: (string | number)[];

  /** Human-readable message */
  msg: string;
}

/**
 * Base error for everything the core raises.
 *
 * Follows the WHATWG Error shape with `cause` for chaining, while keeping
 * `code` and `details` for structured logging.
 */
export class SwitchboardError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C;

  /** Additional structured details (safe for logs) */
  readonly details: Record<string, unknown>;

  override readonly cause: unknown;

  constructor(
    code: C,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = "SwitchboardError";
    this.code = code;
    this.details = details ?? {};
    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  get meta(): ErrorCodeMetadata {
    return ERROR_CODE_META[this.code];
  }

  toJSON(): {
    name: string;
    code: C;
    message: string;
    details: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Inbound payload failed validation. Carries the issues sent to the client.
 */
export class ValidationError extends SwitchboardError<ErrorCode.VALIDATION> {
  readonly issues: readonly ErrorDetail[];

  constructor(issues: readonly ErrorDetail[], details?: Record<string, unknown>) {
    super(
      ErrorCode.VALIDATION,
      issues.map((i) => `${i.loc.join(".") || "<root>"}: ${i.msg}`).join("; "),
      details,
    );
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Handler body raised. The original error is kept as `cause`.
 */
export class HandlerError extends SwitchboardError<ErrorCode.HANDLER> {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(ErrorCode.HANDLER, message, details, cause);
    this.name = "HandlerError";
  }
}

/**
 * Event could not be routed (no handler, or invalid).
 */
export class RoutingError extends SwitchboardError<ErrorCode.ROUTING> {
  readonly issues: readonly ErrorDetail[];

  constructor(
    message: string,
    issues: readonly ErrorDetail[] = [],
    details?: Record<string, unknown>,
  ) {
    super(ErrorCode.ROUTING, message, details);
    this.name = "RoutingError";
    this.issues = issues;
  }
}

/**
 * Registry is inconsistent. Raised at startup, never at dispatch time.
 */
export class ConstructionError extends SwitchboardError<ErrorCode.CONSTRUCTION> {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONSTRUCTION, message, details);
    this.name = "ConstructionError";
  }
}

/**
 * Channel-layer primitive failed. Fatal to the specific send only.
 */
export class TransportError extends SwitchboardError<ErrorCode.TRANSPORT> {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(ErrorCode.TRANSPORT, message, details, cause);
    this.name = "TransportError";
  }

  /**
   * Wrap an unknown failure from a transport call. TransportErrors pass through.
   */
  static wrap(
    err: unknown,
    operation: string,
    details?: Record<string, unknown>,
  ): TransportError {
    if (err instanceof TransportError) return err;
    const reason = err instanceof Error ? err.message : String(err);
    return new TransportError(
      `${operation} failed: ${reason}`,
      { operation, ...details },
      err,
    );
  }
}

/**
 * Operation attempted in a connection state that does not allow it.
 */
export class ConnectionStateError extends SwitchboardError<ErrorCode.STATE> {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.STATE, message, details);
    this.name = "ConnectionStateError";
  }
}

/**
 * Type guard for any error raised by the core.
 */
export function isSwitchboardError(err: unknown): err is SwitchboardError {
  return err instanceof SwitchboardError;
}

/**
 * Best-effort serialization of an unknown thrown value for logs.
 */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof SwitchboardError) {
    return { ...err.toJSON(), stack: err.stack };
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}
