export type Frame =
  | { readonly kind: 'line'; readonly text: string }
  | { readonly kind: 'oversize' };

/**
 * Splits a character stream into newline-delimited frames.
 *
 * `\r\n` is accepted, blank lines are skipped. A line that grows past
 * `maxBytes` (UTF-8) yields a single `oversize` frame and the rest of it is
 * dropped up to the next newline.
 */
export class LineDecoder {
  private buffer = '';
  private discarding = false;

  constructor(private readonly maxBytes: number) {}

  push(chunk: string): Frame[] {
    const frames: Frame[] = [];
    let data = chunk;

    if (this.discarding) {
      const newline = data.indexOf('\n');
      if (newline === -1) return frames;
      this.discarding = false;
      data = data.slice(newline + 1);
    }

    this.buffer += data;

    let newlineIndex: number;
    while ((newlineIndex = this.buffer.indexOf('\n')) !== -1) {
      const raw = this.buffer.slice(0, newlineIndex);
      this.buffer = this.buffer.slice(newlineIndex + 1);
      const frame = this.toFrame(raw);
      if (frame) frames.push(frame);
    }

    if (Buffer.byteLength(this.buffer, 'utf8') > this.maxBytes) {
      this.buffer = '';
      this.discarding = true;
      frames.push({ kind: 'oversize' });
    }

    return frames;
  }

  /** End of stream: whatever is left becomes the last frame. */
  flush(): Frame[] {
    const rest = this.buffer;
    this.buffer = '';
    if (this.discarding) {
      this.discarding = false;
      return [];
    }
    const frame = this.toFrame(rest);
    return frame ? [frame] : [];
  }

  get buffered(): number {
    return this.buffer.length;
  }

  private toFrame(raw: string): Frame | null {
    const text = raw.trim();
    if (!text) return null;
    if (Buffer.byteLength(text, 'utf8') > this.maxBytes) return { kind: 'oversize' };
    return { kind: 'line', text };
  }
}
