/**
 * Error types shared across the server. Stage code catches the gateway and
 * store errors and degrades; only cancellation propagates to the caller.
 */

export type ModelGatewayErrorKind = "http" | "timeout" | "invalid_output" | "empty";

export class ModelGatewayError extends Error {
  readonly kind: ModelGatewayErrorKind;

  constructor(kind: ModelGatewayErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelGatewayError";
    this.kind = kind;
  }
}

export type GraphStoreErrorKind = "timeout" | "execution" | "unavailable";

export class GraphStoreError extends Error {
  readonly kind: GraphStoreErrorKind;
  /** Driver error code, when the database supplied one */
  readonly code?: string;

  constructor(kind: GraphStoreErrorKind, message: string, options?: { cause?: unknown; code?: string }) {
    super(message, { cause: options?.cause });
    this.name = "GraphStoreError";
    this.kind = kind;
    this.code = options?.code;
  }
}

export class SessionBusyError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is already processing a message`);
    this.name = "SessionBusyError";
  }
}

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = "SessionNotFoundError";
  }
}

/** Thrown when the caller's signal fires; never classified as a query failure. */
export class PipelineAbortedError extends Error {
  constructor(reason?: unknown) {
    super("Pipeline run cancelled", { cause: reason });
    this.name = "PipelineAbortedError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : JSON.stringify(err);
}

/**
 * Throw if the signal has fired. Used between stage steps so a cancelled run
 * stops before its next external call.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PipelineAbortedError(signal.reason);
  }
}
