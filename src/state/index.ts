/**
 * State module
 *
 * Last committed snapshot per subscription key:
 * - MemoryStateStore (default, process lifetime)
 * - JsonFileStateStore (survives restarts)
 */

export { JsonFileStateStore } from './json-file';
export { MemoryStateStore } from './memory';
export type { StateStore } from './types';
