export type RecipeErrorKind =
  | 'ValidationError'
  | 'DuplicateName'
  | 'NotFound'
  | 'StorageReadError'
  | 'StorageWriteError'
  | 'InvalidServings'

export class RecipeError extends Error {
  readonly kind: RecipeErrorKind

  constructor(kind: RecipeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RecipeError'
    this.kind = kind
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: RecipeError }

export const ok = <T>(value: T): Result<T> => ({ ok: true, value })

export const fail = <T = never>(
  kind: RecipeErrorKind,
  message: string,
  cause?: unknown,
): Result<T> => ({
  ok: false,
  error: new RecipeError(kind, message, cause === undefined ? undefined : { cause }),
})

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
