import { Writable } from 'node:stream';

/**
 * In-memory log destination for tests.
 */
export class CaptureStream extends Writable {
  readonly chunks: string[] = [];
  private waiters: Array<() => void> = [];

  _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.chunks.push(chunk.toString());
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((resolve) => resolve());
    callback();
  }

  /** Parsed JSON records, one per line written. */
  records(): Array<Record<string, unknown>> {
    return this.text()
      .split('\n')
      .filter((line) => line !== '')
      .map((line): Record<string, unknown> => JSON.parse(line));
  }

  text(): string {
    return this.chunks.join('');
  }

  /** Resolves once at least `count` chunks were written. */
  async waitForWrites(count = 1): Promise<void> {
    while (this.chunks.length < count) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }
}
