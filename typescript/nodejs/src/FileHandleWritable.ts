import type { IPartialWritable } from "@write-sink/core";
import type { FileHandle } from "node:fs/promises";

/**
 * IPartialWritable implementation for FileHandle.
 */
export class FileHandleWritable implements IPartialWritable {
  #handle: FileHandle;
  #totalBytesWritten = 0;

  constructor(handle: FileHandle) {
    this.#handle = handle;
  }

  async write(buffer: Uint8Array): Promise<number> {
    const written = await this.#handle.write(buffer);
    this.#totalBytesWritten += written.bytesWritten;
    return written.bytesWritten;
  }

  async flush(): Promise<void> {
    await this.#handle.sync();
  }

  async close(): Promise<void> {
    await this.#handle.close();
  }

  position(): number {
    return this.#totalBytesWritten;
  }
}
