export * from "./core/types/effect";
export * from "./core/runtime/events";
export { Registry, type FiberState, type RingState } from "./core/runtime/registry";
export { EventTranslator, CATEGORY, type TranslatorOptions } from "./core/runtime/translator";
export { dumpRegistry } from "./core/runtime/dump";
export * from "./core/runtime/logger";
export { Scope, acquireRelease, type Finalizer } from "./core/runtime/scope";
export { Interrupted, isInterrupted, sleepMs } from "./core/runtime/sleep";
export { race, Deferred } from "./core/runtime/structuredConcurrency";
export { retryWithFixedDelay, type RetryPolicy } from "./core/runtime/retry";

export { flatId, ringKoid, fiberKoid, type Koid, type IdSpace } from "./core/trace/koid";
export * from "./core/trace/writer";
export { FxtWriter, FXT_MAGIC } from "./core/trace/fxt";
export { FileSink, MemorySink, TraceWriteError, type ByteSink } from "./core/trace/sink";
export { RecordingTraceWriter, type TraceRecord } from "./core/trace/recording";

export { FileEventCursor, fileEventSource, CursorUnavailableError, type EventCursor, type EventSource } from "./core/stream/cursor";
export { EventFileEmitter } from "./core/stream/emitter";
export { ENV, decodeLine, encodeEvent, encodeLost, eventFileName, type DecodedLine } from "./core/stream/wire";

export * from "./session/config";
export * from "./session/errors";
export * from "./session/process";
export * from "./session/viewer";
export * from "./session/session";
