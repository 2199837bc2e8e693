export * from "./FileHandleWritable";
export * from "./NodeStreamWritable";
export * from "./toNodeWritable";
export * from "./toWritableStream";
