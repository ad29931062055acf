/**
 * Result Stream Module
 */

export { ResultStreamer } from './result-streamer.js';
export type { ResultStreamerDependencies } from './result-streamer.js';
