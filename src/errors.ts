export type CollectionErrorKind =
  | "FileLoadError"
  | "FileSaveError"
  | "ValidationError"
  | "NotFoundError"
  | "NothingRemovedError"
  | "ExportError";

/**
 * Recoverable failure from the collection core. Returned inside a
 * StoreResult rather than thrown; callers decide how to present it.
 */
export class CollectionError extends Error {
  readonly kind: CollectionErrorKind;

  constructor(kind: CollectionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/** Render an unknown thrown value as a one-line detail string. */
export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatError(error: CollectionError): string {
  return `${error.kind}: ${error.message}`;
}
