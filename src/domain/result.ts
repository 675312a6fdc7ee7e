/**
 * Test execution result model.
 */

/** Terminal outcome of a started node. */
export enum ResultStatus {
  Successful = 'successful',
  /** A precondition or assumption did not hold; not a failure. */
  Aborted = 'aborted',
  Failed = 'failed',
}

export interface ExecutionResult {
  status: ResultStatus;
  /**
   * What made the node abort or fail. Opaque diagnostic payload: consumers
   * may display it or match on its type, but never branch on its contents.
   */
  cause?: unknown;
}

const SUCCESSFUL: ExecutionResult = Object.freeze({ status: ResultStatus.Successful });

export function successful(): ExecutionResult {
  return SUCCESSFUL;
}

export function aborted(cause?: unknown): ExecutionResult {
  return Object.freeze({ status: ResultStatus.Aborted, cause });
}

export function failed(cause?: unknown): ExecutionResult {
  return Object.freeze({ status: ResultStatus.Failed, cause });
}
