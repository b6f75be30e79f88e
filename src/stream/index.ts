export { createStream, isAsyncIterable, isMessageStream } from './message-stream.js'
export type {
  MessageStream,
  StreamChunk,
  StreamOptions,
  StreamState,
} from '../types/stream.js'
