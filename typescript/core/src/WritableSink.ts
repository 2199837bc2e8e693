import { toBytes } from "./ByteSource";
import type { ByteSource } from "./ByteSource";
import type { IPartialWritable } from "./IPartialWritable";
import { SinkStateError } from "./SinkStateError";

export type WritableSinkState = "idle" | "draining" | "suspended" | "failed" | "closed";

type PendingWrite = {
  bytes: Uint8Array;
  offset: number;
};

/**
 * WritableSink accepts byte items one at a time and writes each of them to an IPartialWritable
 * before accepting the next one.
 *
 * Every operation resolves with `true` once it has completed, or `false` when the writer accepted
 * 0 bytes and the operation has to be repeated after `whenWritable()` resolves. Bytes already
 * accepted by the writer are never written again.
 *
 * Errors from the writer are rethrown unchanged and leave the sink in the `failed` state.
 *
 * NOTE: callers must wait on any method call to complete before calling another method.
 */
export class WritableSink<Item extends ByteSource = ByteSource> {
  #writable: IPartialWritable;
  #pending: PendingWrite | undefined;
  #state: WritableSinkState = "idle";
  #busy = false;

  constructor(writable: IPartialWritable) {
    this.#writable = writable;
  }

  get state(): WritableSinkState {
    return this.#state;
  }

  /** Number of bytes of the in-flight item that the writer has not accepted yet. */
  get pendingBytes(): number {
    if (!this.#pending) {
      return 0;
    }
    return this.#pending.bytes.byteLength - this.#pending.offset;
  }

  /**
   * Resolves `true` once the sink can accept the next item. An idle sink resolves without touching
   * the writer; otherwise the pending item is written first.
   */
  async ready(): Promise<boolean> {
    return await this.#run("ready", async () => await this.#drain());
  }

  /**
   * Accept an item and start writing it. Resolves `false` if part of it is still pending.
   *
   * The item's bytes are not copied: changes made to its buffer while it is pending are what gets
   * written.
   */
  async submit(item: Item): Promise<boolean> {
    this.#assertUsable("submit");
    if (this.#pending) {
      throw new SinkStateError("submit() called before the previous item was written");
    }
    const bytes = toBytes(item);
    return await this.#run("submit", async () => {
      this.#pending = { bytes, offset: 0 };
      return await this.#drain();
    });
  }

  /**
   * Write the pending item, then flush the writer. The writer is not flushed while part of the
   * pending item remains.
   */
  async flush(): Promise<boolean> {
    return await this.#run("flush", async () => {
      if (!(await this.#drain())) {
        return false;
      }
      await this.#writable.flush();
      return true;
    });
  }

  /**
   * Write the pending item, then close the writer. A closed sink rejects any further call.
   */
  async close(): Promise<boolean> {
    return await this.#run("close", async () => {
      if (!(await this.#drain())) {
        return false;
      }
      await this.#writable.close();
      this.#state = "closed";
      return true;
    });
  }

  /**
   * Resolves when an operation that returned `false` is worth repeating.
   */
  async whenWritable(): Promise<void> {
    if (this.#writable.whenWritable) {
      await this.#writable.whenWritable();
      return;
    }
    await new Promise<void>((resolve) => setTimeout(resolve, 0));
  }

  async #drain(): Promise<boolean> {
    const pending = this.#pending;
    if (!pending) {
      return true;
    }

    this.#state = "draining";
    while (pending.offset < pending.bytes.byteLength) {
      const remaining = pending.bytes.byteLength - pending.offset;
      const written = await this.#writable.write(pending.bytes.subarray(pending.offset));
      if (!Number.isInteger(written) || written < 0 || written > remaining) {
        throw new RangeError(`Writer accepted ${written} bytes out of ${remaining}`);
      }
      if (written === 0) {
        this.#state = "suspended";
        return false;
      }
      pending.offset += written;
    }

    this.#pending = undefined;
    this.#state = "idle";
    return true;
  }

  async #run(operation: string, body: () => Promise<boolean>): Promise<boolean> {
    this.#assertUsable(operation);
    this.#busy = true;
    try {
      return await body();
    } catch (error) {
      this.#pending = undefined;
      this.#state = "failed";
      throw error;
    } finally {
      this.#busy = false;
    }
  }

  #assertUsable(operation: string): void {
    if (this.#busy) {
      throw new SinkStateError(`${operation}() called while another operation is in progress`);
    }
    if (this.#state === "failed" || this.#state === "closed") {
      throw new SinkStateError(`${operation}() called on a ${this.#state} sink`);
    }
  }
}
