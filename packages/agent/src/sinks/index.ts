export { ConsoleSink } from "./console-sink.js";
export {
  PushSink,
  createUdpTransport,
  DEFAULT_PUSH_HOST,
  DEFAULT_PUSH_PORT,
} from "./push-sink.js";
export type { DatagramTransport, PushSinkOptions } from "./push-sink.js";
export type { MetricSink } from "./types.js";
