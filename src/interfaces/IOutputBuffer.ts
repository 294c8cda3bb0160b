/**
 * Interface for a bounded, append-only text sink
 */

export interface IOutputBuffer {
  /** Hard capacity in characters */
  readonly capacity: number;

  /** Current length in characters; never exceeds capacity */
  readonly length: number;

  /** True once an append has been cut off since the last drain */
  readonly truncated: boolean;

  /** Characters discarded because the buffer was full */
  readonly droppedChars: number;

  /**
   * Append text, truncating with a marker when it does not fit
   */
  append(text: string): void;

  /**
   * Read the current content without consuming it
   */
  read(): string;

  /**
   * Return the current content and empty the buffer in one step
   */
  drain(): string;
}
