// --- Result ---
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// --- File reference errors ---
export type FileReferenceErrorKind =
  | 'unsupported' // no durable reference can be minted for this path
  | 'unresolvable'; // a stored reference no longer leads to a readable file

export class FileReferenceError extends Error {
  readonly kind: FileReferenceErrorKind;

  constructor(kind: FileReferenceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FileReferenceError';
    this.kind = kind;
  }
}

// --- Store errors ---
export type StoreErrorKind = 'serialization_failed' | 'write_failed';

export class StoreError extends Error {
  readonly kind: StoreErrorKind;

  constructor(kind: StoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.kind = kind;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
