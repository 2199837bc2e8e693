import type { IPartialWritable } from "./IPartialWritable";

export type WriterCall =
  | { type: "write"; data: Uint8Array }
  | { type: "flush" }
  | { type: "close" };

/**
 * Outcome of one write() call: the number of bytes to report as accepted, an error to reject
 * with, or a promise settling to either of those later.
 */
export type WriteStep = number | Error | Promise<number>;

/**
 * IPartialWritable that records every call and answers writes from a queue of steps. Once the
 * queue is empty, writes accept up to `chunkSize` bytes.
 */
export class ScriptedWritable implements IPartialWritable {
  readonly calls: WriterCall[] = [];
  /** The bytes accepted by each write, in order. */
  readonly accepted: Uint8Array[] = [];
  whenWritableCalls = 0;
  flushError: Error | undefined;
  closeError: Error | undefined;

  #steps: WriteStep[] = [];
  #chunkSize: number;

  constructor({ chunkSize = Infinity }: { chunkSize?: number } = {}) {
    this.#chunkSize = chunkSize;
  }

  queueWrites(...steps: WriteStep[]): void {
    this.#steps.push(...steps);
  }

  async write(data: Uint8Array): Promise<number> {
    this.calls.push({ type: "write", data: new Uint8Array(data) });
    const step = this.#steps.shift() ?? Math.min(this.#chunkSize, data.byteLength);
    if (step instanceof Error) {
      throw step;
    }
    const count = await step;
    this.accepted.push(new Uint8Array(data.subarray(0, count)));
    return count;
  }

  async flush(): Promise<void> {
    this.calls.push({ type: "flush" });
    if (this.flushError) {
      throw this.flushError;
    }
  }

  async close(): Promise<void> {
    this.calls.push({ type: "close" });
    if (this.closeError) {
      throw this.closeError;
    }
  }

  async whenWritable(): Promise<void> {
    this.whenWritableCalls++;
  }

  callTypes(): WriterCall["type"][] {
    return this.calls.map((call) => call.type);
  }

  written(): Uint8Array {
    const total = this.accepted.reduce((sum, chunk) => sum + chunk.byteLength, 0);
    const result = new Uint8Array(total);
    let offset = 0;
    for (const chunk of this.accepted) {
      result.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return result;
  }
}

export function decode(data: Uint8Array): string {
  return new TextDecoder().decode(data);
}

export async function flushPromises(): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, 0));
}
