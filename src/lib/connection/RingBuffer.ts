/**
 * RingBuffer - Pre-allocated circular byte buffer for serial stream reassembly.
 *
 * The frame decoder appends every incoming chunk here and consumes complete
 * records from the tail. No allocation happens after construction except when
 * a complete record is copied out.
 *
 * Overflow policy: the oldest bytes are discarded to make room. A partial
 * record that loses its head is later rejected by the format's own checks
 * (line parse, header scan, checksum), so the stream resynchronizes.
 */

const DEFAULT_RING_BUFFER_SIZE = 16384; // 16KB

export class RingBuffer {
  private buf: Uint8Array;
  private readonly capacity: number;
  private head = 0; // write position
  private tail = 0; // read position
  private _size = 0;
  private overflowEvents = 0;
  private overflowBytes = 0;

  constructor(size: number = DEFAULT_RING_BUFFER_SIZE) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`RingBuffer size must be a positive integer, got ${size}`);
    }
    this.capacity = size;
    this.buf = new Uint8Array(size);
  }

  get length(): number {
    return this._size;
  }

  get size(): number {
    return this.capacity;
  }

  /** Append data, discarding the oldest bytes if it does not fit */
  write(data: Uint8Array): void {
    let src = data;
    if (src.length > this.capacity) {
      // Only the newest `capacity` bytes can survive anyway
      this.overflowEvents++;
      this.overflowBytes += this._size + (src.length - this.capacity);
      this.clear();
      src = src.subarray(src.length - this.capacity);
    }

    const len = src.length;
    if (len > this.capacity - this._size) {
      const discard = len - (this.capacity - this._size);
      this.overflowEvents++;
      this.overflowBytes += discard;
      this.tail = (this.tail + discard) % this.capacity;
      this._size -= discard;
    }

    // Write in up to 2 segments (wrap around)
    const firstLen = Math.min(len, this.capacity - this.head);
    this.buf.set(src.subarray(0, firstLen), this.head);
    if (firstLen < len) {
      this.buf.set(src.subarray(firstLen), 0);
    }
    this.head = (this.head + len) % this.capacity;
    this._size += len;
  }

  /** Byte at offset from tail (no copy). Caller checks offset < length. */
  peekByte(offset: number): number {
    return this.buf[(this.tail + offset) % this.capacity];
  }

  /** Copy `len` bytes starting at `offset` from tail without consuming them */
  peek(offset: number, len: number): Uint8Array {
    const result = new Uint8Array(len);
    const start = (this.tail + offset) % this.capacity;
    const firstLen = Math.min(len, this.capacity - start);
    result.set(this.buf.subarray(start, start + firstLen));
    if (firstLen < len) {
      result.set(this.buf.subarray(0, len - firstLen), firstLen);
    }
    return result;
  }

  /** Offset (from tail) of the first byte matching `predicate`, or -1 */
  findIndex(predicate: (byte: number) => boolean, from = 0): number {
    for (let i = from; i < this._size; i++) {
      if (predicate(this.peekByte(i))) return i;
    }
    return -1;
  }

  /** Extract and consume a contiguous slice */
  read(len: number): Uint8Array {
    const result = this.peek(0, len);
    this.skip(len);
    return result;
  }

  /** Consume bytes without copying */
  skip(len: number): void {
    const skipLen = Math.min(len, this._size);
    this.tail = (this.tail + skipLen) % this.capacity;
    this._size -= skipLen;
  }

  clear(): void {
    this.head = 0;
    this.tail = 0;
    this._size = 0;
  }

  /** Return and reset overflow counters */
  drainOverflowStats(): { events: number; bytes: number } {
    const stats = { events: this.overflowEvents, bytes: this.overflowBytes };
    this.overflowEvents = 0;
    this.overflowBytes = 0;
    return stats;
  }
}
