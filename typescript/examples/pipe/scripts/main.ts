import { WritableSink, complete, feed } from "@write-sink/core";
import { FileHandleWritable } from "@write-sink/nodejs";
import { program } from "commander";
import { createReadStream } from "fs";
import { open } from "fs/promises";
import { performance } from "perf_hooks";

type PipeOptions = {
  input?: string;
  flushEvery?: number;
};

function log(...data: unknown[]) {
  console.log(...data);
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`Expected a positive integer, got ${value}`);
  }
  return count;
}

async function pipe(outputFilePath: string, options: PipeOptions) {
  const startTime = performance.now();
  const outputFileHandle = await open(outputFilePath, "w");
  const writable = new FileHandleWritable(outputFileHandle);
  const sink = new WritableSink<Uint8Array>(writable);
  const input = options.input != undefined ? createReadStream(options.input) : process.stdin;

  let itemCount = 0;
  for await (const chunk of input) {
    const data: unknown = chunk;
    if (!(data instanceof Uint8Array)) {
      throw new Error("expected buffer");
    }
    await feed(sink, data);
    itemCount++;
    if (options.flushEvery != undefined && itemCount % options.flushEvery === 0) {
      await complete(sink, async () => await sink.flush());
    }
  }
  await complete(sink, async () => await sink.close());

  const durationMs = performance.now() - startTime;
  log(`Wrote ${itemCount} chunks (${writable.position()} bytes) in ${durationMs.toFixed(2)}ms`);
}

program
  .description("Copy stdin or a file into an output file one chunk at a time")
  .argument("<output-file>", "Path for the output file")
  .option("-i, --input <file>", "Read from a file instead of stdin")
  .option("-f, --flush-every <chunks>", "Flush the output file after this many chunks", parseCount)
  .action(async (outputFilePath: string, options: PipeOptions) => {
    try {
      await pipe(outputFilePath, options);
    } catch (error) {
      console.error(error);
      process.exitCode = 1;
    }
  });
void program.parseAsync();
