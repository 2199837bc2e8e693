import type { IPartialWritable } from "./IPartialWritable";

export type MemoryWritableOptions = {
  /** Upper bound on the bytes accepted by a single write. */
  maxWriteSize?: number;
};

/**
 * IPartialWritable collecting everything written to it in memory.
 */
export class MemoryWritable implements IPartialWritable {
  #buffer = new ArrayBuffer(1024);
  #size = 0;
  #maxWriteSize: number;
  #flushCount = 0;
  #closed = false;

  constructor(options: MemoryWritableOptions = {}) {
    const { maxWriteSize = Infinity } = options;
    if (!(maxWriteSize >= 1)) {
      throw new RangeError(`maxWriteSize must be at least 1, got ${maxWriteSize}`);
    }
    this.#maxWriteSize = maxWriteSize;
  }

  get flushCount(): number {
    return this.#flushCount;
  }

  get closed(): boolean {
    return this.#closed;
  }

  async write(data: Uint8Array): Promise<number> {
    if (this.#closed) {
      throw new Error("write() called after close()");
    }
    const length = Math.min(data.byteLength, Math.floor(this.#maxWriteSize));
    if (this.#size + length > this.#buffer.byteLength) {
      const newBuffer = new ArrayBuffer(Math.max(this.#size + length, this.#buffer.byteLength * 2));
      new Uint8Array(newBuffer).set(new Uint8Array(this.#buffer, 0, this.#size));
      this.#buffer = newBuffer;
    }
    new Uint8Array(this.#buffer, this.#size).set(data.subarray(0, length));
    this.#size += length;
    return length;
  }

  async flush(): Promise<void> {
    this.#flushCount++;
  }

  async close(): Promise<void> {
    this.#closed = true;
  }

  get(): Uint8Array {
    return new Uint8Array(this.#buffer, 0, this.#size);
  }
}
