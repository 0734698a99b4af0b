/**
 * Change events - produced and consumed within one cycle, never stored
 */

import type { FeedItem, LiveSnapshot, Snapshot } from '../sources';

interface ChangeEventBase {
  /** Subscription key (unique per subscription) */
  subscription: string;
  /** Followed person's display name */
  name: string;
  /** Platform display name, e.g. "Twitter" */
  platform: string;
  detectedAt: Date;
}

export interface LiveStartedEvent extends ChangeEventBase {
  kind: 'LiveStarted';
  payload: { live: LiveSnapshot };
}

export interface LiveEndedEvent extends ChangeEventBase {
  kind: 'LiveEnded';
  payload: { live: LiveSnapshot; previous: LiveSnapshot };
}

export interface LiveTitleChangedEvent extends ChangeEventBase {
  kind: 'LiveTitleChanged';
  payload: { live: LiveSnapshot; previousTitle: string };
}

export interface NewItemEvent extends ChangeEventBase {
  kind: 'NewItem';
  payload: { item: FeedItem };
}

/** Emitted by the log reporter, not by detection */
export interface LogEventRecord extends ChangeEventBase {
  kind: 'Log';
  payload: { level: string; message: string };
}

export type ChangeEvent =
  | LiveStartedEvent
  | LiveEndedEvent
  | LiveTitleChangedEvent
  | NewItemEvent
  | LogEventRecord;

export type ChangeKind = ChangeEvent['kind'];

export interface DetectOptions {
  /** Report online -> offline transitions */
  liveOffline: boolean;
  /** Report title changes while the online state is unchanged */
  liveTitle: boolean;
}

export const DEFAULT_DETECT_OPTIONS: DetectOptions = {
  liveOffline: false,
  liveTitle: false,
};

export interface DetectionResult {
  /** Events in detection order (oldest first) */
  events: ChangeEvent[];
  /** Snapshot to commit */
  next: Snapshot;
  /** True when there was no previous snapshot */
  baseline: boolean;
}
