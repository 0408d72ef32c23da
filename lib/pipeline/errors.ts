export type BatchErrorCode =
  | "missing_document"
  | "invalid_encoding"
  | "invalid_json"
  | "not_a_mapping"
  | "missing_list";

/** The batch document itself is unusable; nothing can be aggregated. */
export class BatchError extends Error {
  constructor(
    message: string,
    public readonly code: BatchErrorCode
  ) {
    super(message);
    this.name = "BatchError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
