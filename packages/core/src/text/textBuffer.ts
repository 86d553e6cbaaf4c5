/**
 * Append-only text storage.
 *
 * Appends are collected as chunks and joined lazily, so a stream of small
 * writes between draws costs one concatenation per draw.
 */

export class TextBuffer {
  private chunks: string[] = [];
  private joined = "";
  private size = 0;

  get length(): number {
    return this.size;
  }

  append(text: string): void {
    if (text.length === 0) return;
    this.chunks.push(text);
    this.size += text.length;
  }

  reset(): void {
    this.chunks = [];
    this.joined = "";
    this.size = 0;
  }

  toString(): string {
    if (this.chunks.length > 0) {
      this.joined += this.chunks.join("");
      this.chunks = [];
    }
    return this.joined;
  }
}
