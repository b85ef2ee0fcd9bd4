/**
 * Collects process output up to a byte limit. Decoding happens once at the end
 * so multi-byte characters are never split between chunks.
 */
export class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private overflowed = false;

  constructor(private readonly limitBytes: number) {}

  push(data: Buffer): void {
    const room = this.limitBytes - this.size;
    if (room <= 0) {
      this.overflowed = true;
      return;
    }
    if (data.length > room) {
      this.chunks.push(data.subarray(0, room));
      this.size += room;
      this.overflowed = true;
      return;
    }
    this.chunks.push(data);
    this.size += data.length;
  }

  get truncated(): boolean {
    return this.overflowed;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}
