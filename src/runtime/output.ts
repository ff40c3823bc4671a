/**
 * Byte-capped capture of a process output stream.
 */
export class CappedOutput {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private overflowed = false;

  constructor(private readonly limit: number) {}

  /**
   * Keep bytes up to the limit; anything beyond is dropped and marks the
   * capture as truncated.
   */
  push(chunk: Buffer | string): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    if (bytes.length === 0) return;

    const room = this.limit - this.size;
    if (room <= 0) {
      this.overflowed = true;
      return;
    }
    if (bytes.length > room) {
      this.chunks.push(bytes.subarray(0, room));
      this.size += room;
      this.overflowed = true;
      return;
    }
    this.chunks.push(bytes);
    this.size += bytes.length;
  }

  get truncated(): boolean {
    return this.overflowed;
  }

  get byteLength(): number {
    return this.size;
  }

  /**
   * Captured bytes as UTF-8. Invalid sequences, including a character cut
   * by the cap, decode to U+FFFD.
   */
  text(): string {
    return new TextDecoder('utf-8').decode(Buffer.concat(this.chunks));
  }
}
