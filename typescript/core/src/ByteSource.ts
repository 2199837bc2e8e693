export type ByteSource = ArrayBufferView | ArrayBuffer | string;

const textEncoder = new TextEncoder();

/**
 * View the bytes of an item without copying. Strings are encoded as UTF-8.
 */
export function toBytes(item: ByteSource): Uint8Array {
  if (typeof item === "string") {
    return textEncoder.encode(item);
  }
  if (item instanceof Uint8Array) {
    return item;
  }
  if (ArrayBuffer.isView(item)) {
    return new Uint8Array(item.buffer, item.byteOffset, item.byteLength);
  }
  return new Uint8Array(item);
}
