export { HttpTransport } from './http-transport.js';
export type { FetchFn } from './http-transport.js';
export { replayFile, parseLine } from './replay.js';
export type { ReplayOptions, ReplaySummary, ParsedLine } from './replay.js';
export type { Transport, SendResult, HttpTransportConfig } from './types.js';
