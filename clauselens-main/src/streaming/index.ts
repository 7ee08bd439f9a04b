export { AnswerStream } from "./answer-stream.js";
export type { StreamProducer } from "./answer-stream.js";
export { Channel } from "./channel.js";
export { StreamCoordinator, splitFragments } from "./stream-coordinator.js";
export type { CitationsEvent, FragmentEvent, StreamEvent, StreamOptions } from "./types.js";
