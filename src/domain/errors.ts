/**
 * Typed error model for the reporting pipeline.
 *
 * Infrastructure failures (bad identifiers, out-of-order events, listener
 * faults, tracking I/O) travel as TypedError values wrapped in an Error
 * subclass. Test outcomes never use this channel; they are carried by the
 * `result` field of finished events.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain = 'IDENTIFIER' | 'EVENT' | 'LISTENER' | 'TRACKING';

/** Typed suggested fix a caller can act on. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "EVENT.INVALID_TRANSITION"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Extract a printable message from an arbitrary thrown value. */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  return String(cause);
}

// --- Common error factory functions ---

export function malformedIdentifierError(input: string, token: string, reason: string): TypedError {
  return createTypedError({
    code: 'IDENTIFIER.MALFORMED',
    message: `Malformed unique id segment "${token}": ${reason}`,
    details: { input, token },
    suggestedFixes: [
      {
        type: 'FIX_SEGMENT_SYNTAX',
        params: { expected: '[type:value]' },
        description: 'Each segment must be written as [type:value] and segments joined by "/"',
      },
    ],
  });
}

export function invalidTransitionError(uniqueId: string, current: string, target: string): TypedError {
  return createTypedError({
    code: 'EVENT.INVALID_TRANSITION',
    message: `Invalid lifecycle transition for ${uniqueId}: ${current} -> ${target}`,
    details: { uniqueId, current, target },
  });
}

export function parentNotStartedError(uniqueId: string, parentId: string, parentState: string): TypedError {
  return createTypedError({
    code: 'EVENT.PARENT_NOT_STARTED',
    message: `Event for ${uniqueId} published while parent ${parentId} is ${parentState}`,
    details: { uniqueId, parentId, parentState },
  });
}

export function duplicateRootError(sessionId: string, rootId: string, uniqueId: string): TypedError {
  return createTypedError({
    code: 'EVENT.DUPLICATE_ROOT',
    message: `Session ${sessionId} already has root ${rootId}; cannot add root ${uniqueId}`,
    details: { sessionId, rootId, uniqueId },
  });
}

export function sessionClosedError(sessionId: string, uniqueId?: string): TypedError {
  return createTypedError({
    code: 'EVENT.SESSION_CLOSED',
    message: `Session ${sessionId} has already ended`,
    details: { sessionId, uniqueId },
  });
}

export function registrationClosedError(sessionId: string): TypedError {
  return createTypedError({
    code: 'EVENT.REGISTRATION_CLOSED',
    message: `Listeners cannot be registered after session ${sessionId} has started`,
    details: { sessionId },
    suggestedFixes: [
      { type: 'REGISTER_BEFORE_START', params: {}, description: 'Register every listener before the first event is published' },
    ],
  });
}

export function listenerCallbackError(listener: string, callback: string, cause: unknown): TypedError {
  return createTypedError({
    code: 'LISTENER.CALLBACK',
    message: `Listener "${listener}" threw in ${callback}: ${describeCause(cause)}`,
    details: { listener, callback },
  });
}

export function trackingIoError(outputPath: string, cause: unknown): TypedError {
  return createTypedError({
    code: 'TRACKING.IO',
    message: `Failed to write unique ids to ${outputPath}: ${describeCause(cause)}`,
    retryable: true,
    details: { outputPath },
    suggestedFixes: [
      { type: 'CHECK_OUTPUT_DIR', params: { outputPath }, description: 'Verify the output directory is writable' },
    ],
  });
}

/** Error thrown by listeners for infrastructure faults they detect themselves. */
export class ListenerError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ListenerError';
  }
}
