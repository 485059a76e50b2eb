/**
 * Error codes surfaced by the retrieval core.
 */
export enum RagErrorCode {
  IO_FAILURE = "IO_FAILURE",
  DIMENSION_MISMATCH = "DIMENSION_MISMATCH",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  EMBEDDING_MODEL_MISMATCH = "EMBEDDING_MODEL_MISMATCH",
  EMBEDDING_FAILURE = "EMBEDDING_FAILURE",
  CONFIGURATION_INVALID = "CONFIGURATION_INVALID",
}

export class RagError extends Error {
  constructor(
    public readonly code: RagErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = "RagError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

function messageOf(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "message" in value && typeof value.message === "string") {
    return value.message;
  }
  return undefined;
}

export function getErrorMessage(err: unknown): string {
  const message = messageOf(err);
  if (message === undefined) {
    return String(err);
  }
  const cause = err instanceof RagError ? messageOf(err.cause) : undefined;
  return cause === undefined ? message : `${message}: ${cause}`;
}
