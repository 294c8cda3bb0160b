/**
 * OutputBuffer - Bounded accumulator for captured process output
 *
 * Once an append overflows, the kept prefix is sealed with a truncation
 * marker and later appends are only counted. drain() empties and re-arms.
 */

import { IOutputBuffer } from "../interfaces/IOutputBuffer";
import { BridgeError } from "../types";

export const TRUNCATION_MARKER = "\n... [output truncated]";

export class OutputBuffer implements IOutputBuffer {
  private content = "";
  private isTruncated = false;
  private dropped = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new BridgeError(
        "ValidationFailed",
        `Output buffer capacity must be a positive integer, got ${capacity}`
      );
    }
  }

  get length(): number {
    return this.content.length;
  }

  get truncated(): boolean {
    return this.isTruncated;
  }

  get droppedChars(): number {
    return this.dropped;
  }

  append(text: string): void {
    if (text.length === 0) {
      return;
    }

    if (this.isTruncated) {
      this.dropped += text.length;
      return;
    }

    if (this.content.length + text.length <= this.capacity) {
      this.content += text;
      return;
    }

    // The marker counts toward capacity; a tiny capacity keeps only part of it
    const keep = Math.max(0, this.capacity - TRUNCATION_MARKER.length);
    const combined = this.content + text;
    const kept = combined.slice(0, keep);

    this.dropped += combined.length - kept.length;
    this.content = (kept + TRUNCATION_MARKER).slice(0, this.capacity);
    this.isTruncated = true;
  }

  read(): string {
    return this.content;
  }

  drain(): string {
    const text = this.content;
    this.content = "";
    this.isTruncated = false;
    return text;
  }
}
