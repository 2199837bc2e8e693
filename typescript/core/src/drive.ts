import type { ByteSource } from "./ByteSource";
import type { WritableSink } from "./WritableSink";

/**
 * Repeat `attempt` until it resolves `true`, waiting for the sink to become writable in between.
 */
export async function complete<Item extends ByteSource>(
  sink: WritableSink<Item>,
  attempt: () => Promise<boolean>,
): Promise<void> {
  while (!(await attempt())) {
    await sink.whenWritable();
  }
}

/**
 * Wait until the sink is ready and hand it an item, without waiting for the item to be written.
 */
export async function feed<Item extends ByteSource>(
  sink: WritableSink<Item>,
  item: Item,
): Promise<void> {
  await complete(sink, async () => await sink.ready());
  await sink.submit(item);
}

/**
 * Hand an item to the sink and flush it through to the writer.
 */
export async function send<Item extends ByteSource>(
  sink: WritableSink<Item>,
  item: Item,
): Promise<void> {
  await feed(sink, item);
  await complete(sink, async () => await sink.flush());
}

/**
 * Feed every item from `source` to the sink in order, then close it.
 */
export async function forward<Item extends ByteSource>(
  source: Iterable<Item> | AsyncIterable<Item>,
  sink: WritableSink<Item>,
): Promise<void> {
  for await (const item of source) {
    await feed(sink, item);
  }
  await complete(sink, async () => await sink.close());
}
