/**
 * Detect module
 *
 * Turns consecutive snapshots of one subscription into change events.
 */

export {
  capSeen,
  DEFAULT_SEEN_CAP,
  type DetectParams,
  type DetectSubject,
  detectChanges,
} from './engine';
export { DEFAULT_DETECT_OPTIONS } from './types';
export type {
  ChangeEvent,
  ChangeKind,
  DetectionResult,
  DetectOptions,
  LiveEndedEvent,
  LiveStartedEvent,
  LiveTitleChangedEvent,
  LogEventRecord,
  NewItemEvent,
} from './types';
