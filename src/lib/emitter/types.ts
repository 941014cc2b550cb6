/**
 * Emitter module types
 */

export interface EmitterResult {
  /** File path, or "stdout" */
  destination: string;
  bytes: number;
  sha256: string;
}
