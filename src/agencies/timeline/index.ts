/**
 * Timeline Agency - Public API
 * Pose / Expression / Phoneme tracks resolved into one rig state per instant
 */

export { resolve, combine, resolutionStep } from './compositor';
export { createTimelineService } from './timelineService';
export type { TimelineServiceAPI, TimelineServiceDeps, TimelineState } from './timelineService';
export { TimelineScheduler } from './timelineScheduler';
export type { RigTargetSink, TimelineSchedulerConfig } from './timelineScheduler';
export { timelineMachine, transportStatusOf, insertSorted, replaceById, sortTrack } from './timelineMachine';
export type { TimelineMachine } from './timelineMachine';
export { TransportClock } from './transportClock';
export type { TimelineClock } from './transportClock';
export { toExportTimeline, fromExportTimeline, parseExportTimeline } from './exportTimeline';
export type { ExportKeyframe, ExportTimeline } from './exportTimeline';
export {
  assertValidKeyframe,
  validatePoseTrack,
  validateExpressionTrack,
  validatePhonemeTrack,
} from './trackValidation';
export { TRACK_NAMES, EMPTY_TRACKS } from './types';
export type {
  PoseKeyframe,
  ExpressionKeyframe,
  PhonemeKeyframe,
  AnyKeyframe,
  TimelineTracks,
  TrackName,
  TrackKeyframe,
  TrackContents,
  CombinedKeyframe,
  ResolutionStep,
  TransportStatus,
  TimelineContext,
  TimelineEvent,
} from './types';
