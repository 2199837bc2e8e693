/**
 * IPartialWritable describes an asynchronous byte writer that may accept fewer bytes than offered.
 */
export interface IPartialWritable {
  // Write as much of buffer as the output accepts right now, resolving with the number of bytes
  // accepted. 0 for a non-empty buffer means the output cannot take bytes until whenWritable().
  write(buffer: Uint8Array): Promise<number>;

  // Persist previously accepted bytes
  flush(): Promise<void>;

  // Signal the end of the output
  close(): Promise<void>;

  // Resolves once a writer that accepted 0 bytes can make progress again
  whenWritable?(): Promise<void>;
}
