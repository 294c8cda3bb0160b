/**
 * OutputBuffer tests
 * Covers capacity enforcement, truncation and drain semantics
 */

import { OutputBuffer, TRUNCATION_MARKER } from "./OutputBuffer";
import { BridgeError } from "../types";
import * as fc from "fast-check";

describe("OutputBuffer", () => {
  describe("Basic functionality", () => {
    it("should accumulate appended text", () => {
      const buffer = new OutputBuffer(100);

      buffer.append("hello ");
      buffer.append("world");

      expect(buffer.read()).toBe("hello world");
      expect(buffer.length).toBe(11);
      expect(buffer.truncated).toBe(false);
    });

    it("should ignore empty appends", () => {
      const buffer = new OutputBuffer(100);

      buffer.append("");

      expect(buffer.length).toBe(0);
      expect(buffer.droppedChars).toBe(0);
    });

    it("should keep text that exactly fills the capacity", () => {
      const buffer = new OutputBuffer(5);

      buffer.append("abcde");

      expect(buffer.read()).toBe("abcde");
      expect(buffer.truncated).toBe(false);
    });

    it("should seal an overflowing append with the marker", () => {
      const capacity = TRUNCATION_MARKER.length + 4;
      const buffer = new OutputBuffer(capacity);

      buffer.append("ab");
      buffer.append("cd" + "e".repeat(30));

      expect(buffer.read()).toBe("abcd" + TRUNCATION_MARKER);
      expect(buffer.length).toBe(capacity);
      expect(buffer.truncated).toBe(true);
      expect(buffer.droppedChars).toBe(30);
    });

    it("should drop and count appends after truncation", () => {
      const buffer = new OutputBuffer(TRUNCATION_MARKER.length + 1);

      buffer.append("x" + "y".repeat(40));
      buffer.append("12345");

      expect(buffer.read()).toBe("x" + TRUNCATION_MARKER);
      expect(buffer.droppedChars).toBe(40 + 5);
    });

    it("should truncate the marker itself when capacity is smaller", () => {
      const buffer = new OutputBuffer(4);

      buffer.append("abcdefgh");

      expect(buffer.read()).toBe(TRUNCATION_MARKER.slice(0, 4));
      expect(buffer.length).toBe(4);
    });

    it("should return content and empty the buffer on drain", () => {
      const buffer = new OutputBuffer(100);

      buffer.append("line 1\n");

      expect(buffer.drain()).toBe("line 1\n");
      expect(buffer.read()).toBe("");
      expect(buffer.length).toBe(0);
    });

    it("should re-arm after drain", () => {
      const buffer = new OutputBuffer(TRUNCATION_MARKER.length + 2);

      buffer.append("a".repeat(40));
      expect(buffer.truncated).toBe(true);

      buffer.drain();
      buffer.append("z");

      expect(buffer.truncated).toBe(false);
      expect(buffer.read()).toBe("z");
    });

    it("should reject a non-positive capacity", () => {
      expect(() => new OutputBuffer(0)).toThrow(BridgeError);
      expect(() => new OutputBuffer(-5)).toThrow(BridgeError);
    });
  });

  describe("Property-based tests", () => {
    it("Property: Length never exceeds capacity for any append sequence", () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 1, max: 200 }),
          fc.array(fc.string({ maxLength: 80 }), { maxLength: 30 }),
          (capacity, chunks) => {
            const buffer = new OutputBuffer(capacity);
            for (const chunk of chunks) {
              buffer.append(chunk);
              expect(buffer.length).toBeLessThanOrEqual(capacity);
            }
          }
        ),
        { numRuns: 200 }
      );
    });

    it("Property: A single oversized append keeps the prefix plus marker", () => {
      fc.assert(
        fc.property(
          fc.integer({ min: TRUNCATION_MARKER.length + 1, max: 100 }),
          fc.string({ minLength: 101, maxLength: 300 }),
          (capacity, text) => {
            const buffer = new OutputBuffer(capacity);
            buffer.append(text);

            const keep = capacity - TRUNCATION_MARKER.length;
            expect(buffer.read()).toBe(text.slice(0, keep) + TRUNCATION_MARKER);
            expect(buffer.droppedChars).toBe(text.length - keep);
          }
        ),
        { numRuns: 100 }
      );
    });

    it("Property: The marker appears at most once", () => {
      fc.assert(
        fc.property(
          fc.array(fc.string({ minLength: 1, maxLength: 50 }), {
            minLength: 1,
            maxLength: 20,
          }),
          (chunks) => {
            const buffer = new OutputBuffer(TRUNCATION_MARKER.length + 10);
            for (const chunk of chunks) {
              buffer.append(chunk.replace(/\.\.\./g, ""));
            }
            const occurrences = buffer.read().split(TRUNCATION_MARKER).length - 1;
            expect(occurrences).toBeLessThanOrEqual(1);
          }
        ),
        { numRuns: 100 }
      );
    });

    it("Property: Draining between appends never repeats text", () => {
      fc.assert(
        fc.property(
          fc.array(fc.string({ minLength: 1, maxLength: 20 }), { maxLength: 20 }),
          (chunks) => {
            const buffer = new OutputBuffer(10_000);
            const drained: string[] = [];
            for (const chunk of chunks) {
              buffer.append(chunk);
              drained.push(buffer.drain());
            }
            expect(drained).toEqual(chunks);
          }
        ),
        { numRuns: 100 }
      );
    });
  });
});
