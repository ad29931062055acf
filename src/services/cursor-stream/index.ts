/**
 * Cursor Stream Module
 */

export { CursorStream, paginate } from './cursor-stream.js';
export type { CursorStreamOptions } from './cursor-stream.js';
