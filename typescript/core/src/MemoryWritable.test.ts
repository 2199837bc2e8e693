import { MemoryWritable } from "./MemoryWritable";

describe("MemoryWritable", () => {
  it("accepts at most maxWriteSize bytes per write", async () => {
    const writable = new MemoryWritable({ maxWriteSize: 2 });

    await expect(writable.write(new Uint8Array([1, 2, 3]))).resolves.toBe(2);
    await expect(writable.write(new Uint8Array([3]))).resolves.toBe(1);
    expect(writable.get()).toEqual(new Uint8Array([1, 2, 3]));
  });

  it("grows past its initial capacity", async () => {
    const writable = new MemoryWritable();
    const data = new Uint8Array(3000).fill(7);

    await expect(writable.write(data)).resolves.toBe(3000);
    await expect(writable.write(new Uint8Array([8]))).resolves.toBe(1);
    expect(writable.get().byteLength).toBe(3001);
    expect(writable.get()[2999]).toBe(7);
    expect(writable.get()[3000]).toBe(8);
  });

  it("counts flushes and rejects writes after close", async () => {
    const writable = new MemoryWritable();
    await writable.flush();
    await writable.flush();
    await writable.close();

    expect(writable.flushCount).toBe(2);
    expect(writable.closed).toBe(true);
    await expect(writable.write(new Uint8Array([1]))).rejects.toThrow("write() called after close()");
  });

  it("rejects a maxWriteSize below one byte", () => {
    expect(() => new MemoryWritable({ maxWriteSize: 0 })).toThrow(
      "maxWriteSize must be at least 1, got 0",
    );
  });
});
