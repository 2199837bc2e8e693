import type { IPartialWritable } from "@write-sink/core";
import type { Writable } from "node:stream";
import { finished } from "node:stream/promises";

type FlushWaiter = {
  resolve: () => void;
  reject: (error: unknown) => void;
};

/**
 * IPartialWritable implementation for a Node.js Writable stream.
 *
 * The stream takes a whole buffer at a time, and nothing while it is above its high water mark.
 * flush() resolves once the stream has handed every buffered chunk to its destination.
 */
export class NodeStreamWritable implements IPartialWritable {
  #stream: Writable;
  #error: unknown;
  #flushWaiters: FlushWaiter[] = [];

  constructor(stream: Writable) {
    this.#stream = stream;
    // errors are rethrown from the next call
    stream.on("error", (error) => {
      this.#error ??= error;
      this.#rejectFlushWaiters(error);
    });
    stream.on("close", () => {
      this.#rejectFlushWaiters(stream.errored ?? new Error("Stream closed before it flushed"));
    });
  }

  async write(buffer: Uint8Array): Promise<number> {
    this.#throwIfErrored();
    if (this.#stream.writableNeedDrain) {
      return 0;
    }
    this.#stream.write(buffer, (error) => {
      if (error) {
        this.#rejectFlushWaiters(error);
      } else if (this.#stream.writableLength === 0) {
        const waiters = this.#flushWaiters;
        this.#flushWaiters = [];
        for (const waiter of waiters) {
          waiter.resolve();
        }
      }
    });
    return buffer.byteLength;
  }

  async whenWritable(): Promise<void> {
    this.#throwIfErrored();
    if (!this.#stream.writableNeedDrain) {
      return;
    }
    const stream = this.#stream;
    await new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        stream.off("drain", onDrain);
        stream.off("error", onError);
        stream.off("close", onClose);
      };
      const onDrain = () => {
        cleanup();
        resolve();
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };
      const onClose = () => {
        cleanup();
        reject(stream.errored ?? new Error("Stream closed before it drained"));
      };
      stream.on("drain", onDrain);
      stream.on("error", onError);
      stream.on("close", onClose);
    });
  }

  async flush(): Promise<void> {
    this.#throwIfErrored();
    if (this.#stream.writableLength === 0) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.#flushWaiters.push({ resolve, reject });
    });
  }

  async close(): Promise<void> {
    this.#throwIfErrored();
    this.#stream.end();
    await finished(this.#stream, { readable: false });
  }

  #rejectFlushWaiters(error: unknown): void {
    const waiters = this.#flushWaiters;
    this.#flushWaiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  #throwIfErrored(): void {
    const error = this.#stream.errored ?? this.#error;
    if (error != undefined) {
      throw error;
    }
  }
}
