/**
 * Append-only store for captured child output.
 *
 * @packageDocumentation
 */

import type { OutputChunk, OutputSource } from './types.js';

/**
 * Accumulates output chunks in arrival order.
 *
 * Order is preserved within each stream. Chunks from stdout and stderr are
 * interleaved as they were read, which need not match the order the child
 * wrote them. The buffer is never truncated.
 */
export class OutputBuffer {
  private readonly entries: OutputChunk[] = [];
  private characters = 0;

  /**
   * Appends a chunk. Empty text is ignored.
   */
  append(source: OutputSource, text: string): void {
    if (text === '') {
      return;
    }
    this.entries.push({ source, text });
    this.characters += text.length;
  }

  /**
   * All output so far, concatenated.
   */
  snapshot(): string {
    return this.entries.map((entry) => entry.text).join('');
  }

  /**
   * Output of one stream only.
   */
  text(source: OutputSource): string {
    return this.entries
      .filter((entry) => entry.source === source)
      .map((entry) => entry.text)
      .join('');
  }

  chunks(): readonly OutputChunk[] {
    return [...this.entries];
  }

  /** Total number of UTF-16 code units captured. */
  get length(): number {
    return this.characters;
  }
}
