import { complete, feed } from "@write-sink/core";
import type { ByteSource, WritableSink } from "@write-sink/core";
import { Writable } from "node:stream";

/**
 * Expose a WritableSink as an object mode Node.js Writable. Ending the stream closes the sink.
 */
export function toNodeWritable<Item extends ByteSource>(sink: WritableSink<Item>): Writable {
  return new Writable({
    objectMode: true,
    highWaterMark: 1,
    write(item: Item, _encoding, callback) {
      void feed(sink, item)
        .then(async () => {
          await complete(sink, async () => await sink.ready());
        })
        .then(() => {
          callback();
        }, callback);
    },
    final(callback) {
      void complete(sink, async () => await sink.close()).then(() => {
        callback();
      }, callback);
    },
  });
}
