/**
 * Core shared types for the ASCII Caesar cracker.
 */

// ── Result<T, E> ────────────────────────────────────────────────────────────

type Ok<T> = { readonly ok: true; readonly value: T }
type Err<E> = { readonly ok: false; readonly error: E }
export type Result<T, E = Error> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

// ── Byte input ──────────────────────────────────────────────────────────────

/**
 * Anything that yields byte chunks: arrays of buffers, generators, or a Node
 * `Readable` (which is an `AsyncIterable<Buffer>` when no encoding is set).
 */
export type ByteSource = Iterable<Uint8Array> | AsyncIterable<Uint8Array>

// ── Scores ──────────────────────────────────────────────────────────────────

/**
 * Sparse candidate-key → score mapping. Keys are encryption shifts in
 * [0, 127]; a key with score 0 is never stored.
 */
export type KeyScoreMap = ReadonlyMap<number, number>

/** Dictionary attack outcome: unbounded word-hit counts, higher is better. */
export interface WordHitScores {
  readonly kind: 'word-hits'
  readonly scores: KeyScoreMap
}

/**
 * Frequency attack outcome: every stored key is tied for the minimum
 * distance and carries the value 1.
 */
export interface MinDistanceScores {
  readonly kind: 'min-distance'
  readonly scores: KeyScoreMap
  /** Winning L1 distance, or null when no byte was read. */
  readonly distance: number | null
}

export type AttackScores = WordHitScores | MinDistanceScores

// ── Cipher ──────────────────────────────────────────────────────────────────

export type CipherFailure = 'bad-input-stream' | 'bad-output-stream'

export interface CipherError {
  readonly kind: CipherFailure
  readonly message: string
}
