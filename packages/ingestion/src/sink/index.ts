export type { RecordSink } from "./sink.js";
export { MemoryRecordSink } from "./memory-sink.js";
export { SqliteRecordSink } from "./sqlite-sink.js";
