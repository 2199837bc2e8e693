/**
 * Thrown when a WritableSink is used outside of its contract: submitting while an item is still
 * pending, calling an operation while another is in progress, or using a failed or closed sink.
 */
export class SinkStateError extends Error {
  public readonly code = "SinkState";

  constructor(message: string) {
    super(message);
    this.name = "SinkStateError";
  }
}
