/**
 * Operation capability consumed by the delta update manager.
 *
 * The manager knows nothing about what an operation does. It starts one through
 * an {@link OperationFactory}, hands it a reporter to push results through, and
 * asks it to stop through {@link OperationHandle.cancel} and an `AbortSignal`.
 * @module
 */

/** How an operation ended. */
export type OperationOutcome =
  | { status: "completed" }
  | { status: "failed"; error: Error }
  | { status: "cancelled" };

/**
 * Push channel from a running operation back to its session.
 * Only the operation writes to it. Calls after `finish` are dropped.
 */
export interface OperationReporter<TFragment> {
  /** Append one result fragment. */
  fragment(fragment: TFragment): void;
  /** Append incremental log text. */
  log(text: string): void;
  /** Report the final outcome. The first call wins. */
  finish(outcome: OperationOutcome): void;
}

export interface OperationContext<TFragment> {
  readonly sessionId: string;
  readonly reporter: OperationReporter<TFragment>;
  /** Aborted when the session is terminated. Observe it between units of work. */
  readonly signal: AbortSignal;
}

/** A started operation. */
export interface OperationHandle {
  /**
   * Cooperative stop request. The operation acknowledges by calling
   * `reporter.finish({ status: "cancelled" })` once it has stopped.
   */
  cancel(): void;
}

/**
 * Binds a request to a running operation. `start` returns once the operation is
 * underway; the work itself continues after it returns and reports through the
 * context's reporter.
 */
export interface OperationFactory<TRequest, TFragment, THandle extends OperationHandle = OperationHandle> {
  start(request: TRequest, context: OperationContext<TFragment>): THandle | Promise<THandle>;
}

/** Request-bound factory the session registry invokes. */
export type SessionOperationStarter<TFragment, THandle extends OperationHandle = OperationHandle> = (
  context: OperationContext<TFragment>,
) => THandle | Promise<THandle>;
