export * from "./lib/errors";
export * from "./lib/config";
export {
  createLogger,
  createRateLimiter,
  decoderLog,
  filterLog,
  offsetLog,
  channelLog,
  pipelineLog,
  type Logger,
  type LogLevel,
} from "./lib/logger";

export * from "./lib/connection/SensorFormat";
export * from "./lib/connection/checksum";
export { RingBuffer } from "./lib/connection/RingBuffer";
export * from "./lib/connection/FrameDecoder";
export * from "./lib/connection/FrameEncoder";
export * from "./lib/connection/OrientationChannel";
export * from "./lib/connection/ByteSource";

export * as quaternion from "./lib/math/quaternion";
export { IDENTITY, type Quaternion, type EulerAngles } from "./lib/math/quaternion";
export * from "./lib/math/quaternionValidator";
export * from "./lib/math/resetOffset";

export * from "./lib/fusion/ComplementaryFilter";
export * from "./lib/pipeline/AttitudePipeline";
export * from "./store/pipelineStore";
