/* src/runner/exec/util.ts
 * Utilities for scheduling and child stream handling.
 */

export const sleep = (ms: number): Promise<void> =>
  new Promise<void>((resolveP) => setTimeout(resolveP, ms));

/**
 * Split a chunked text stream into lines. Incomplete trailing text is held
 * until the next chunk or flush().
 */
export class LineSplitter {
  private pending = '';

  constructor(private readonly onLine: (line: string) => void) {}

  public push(chunk: string): void {
    const parts = (this.pending + chunk).split(/\r?\n/);
    this.pending = parts.pop() ?? '';
    for (const p of parts) this.onLine(p);
  }

  public flush(): void {
    if (this.pending.length > 0) this.onLine(this.pending);
    this.pending = '';
  }
}

/** Keep only the last `max` characters of appended text. */
export class TailBuffer {
  private text = '';

  constructor(private readonly max = 4096) {}

  public append(chunk: string): void {
    this.text += chunk;
    if (this.text.length > this.max) this.text = this.text.slice(-this.max);
  }

  public toString(): string {
    return this.text;
  }
}
