import { complete, feed } from "@write-sink/core";
import type { ByteSource, WritableSink } from "@write-sink/core";
import { CountQueuingStrategy, WritableStream } from "node:stream/web";

/**
 * Expose a WritableSink as a WHATWG WritableStream. Each chunk is written to the underlying
 * writer before the stream hands over the next one.
 */
export function toWritableStream<Item extends ByteSource>(
  sink: WritableSink<Item>,
): WritableStream<Item> {
  return new WritableStream<Item>(
    {
      async write(item) {
        await feed(sink, item);
        await complete(sink, async () => await sink.ready());
      },
      async close() {
        await complete(sink, async () => await sink.close());
      },
    },
    new CountQueuingStrategy({ highWaterMark: 1 }),
  );
}
