export { WritableSink } from "./WritableSink";
export type { WritableSinkState } from "./WritableSink";
export { SinkStateError } from "./SinkStateError";
export type { IPartialWritable } from "./IPartialWritable";
export { toBytes } from "./ByteSource";
export type { ByteSource } from "./ByteSource";

export * from "./drive";
export * from "./MemoryWritable";
