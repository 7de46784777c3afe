/**
 * Dataset Decoder Port
 *
 * The dataset parser turning verified dataset bytes into features is an external
 * collaborator. The pipeline only needs to tell a retryable failure (resource
 * contention, transient I/O) from a permanent one (malformed or unsupported data).
 */

export type DecodeOutcome<F> =
  | { status: 'decoded'; features: F }
  | { status: 'retryable'; reason: string; cause?: unknown }
  | { status: 'permanent'; reason: string; cause?: unknown };

/**
 * Dataset Decoder Port Interface
 */
export interface DatasetDecoderPort<F = unknown> {
  /**
   * Decode one dataset. Expected failures resolve as outcomes; a rejection is
   * treated by the loader as a permanent failure.
   */
  decode(bytes: Uint8Array): Promise<DecodeOutcome<F>>;
}

export function decoded<F>(features: F): DecodeOutcome<F> {
  return { status: 'decoded', features };
}

export function retryableFailure<F = never>(reason: string, cause?: unknown): DecodeOutcome<F> {
  return { status: 'retryable', reason, cause };
}

export function permanentFailure<F = never>(reason: string, cause?: unknown): DecodeOutcome<F> {
  return { status: 'permanent', reason, cause };
}
