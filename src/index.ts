/**
 * Sprite rig: routing, playback and timeline compositing for characters
 * rendered as pre-built frame sequences.
 */

export { createRig } from './createRig';
export type { Rig, RigOptions } from './createRig';

export { DEFAULT_RIG_CONFIG, configFromEnv, resolveRigConfig, loadRigConfig } from './config/rigConfig';
export type { RigConfig, RigConfigOverrides, PhonemeTimingConfig } from './config/rigConfig';

export {
  EXPRESSIONS,
  POSES,
  NEUTRAL_EXPRESSION,
  CENTER_POSE,
  NEUTRAL_CENTER,
  isExpressionId,
  isPoseId,
  stateKey,
  sameState,
} from './agencies/rig/types';
export type { ExpressionId, PoseId, RigState, Segment, SegmentDirection, Route } from './agencies/rig/types';
export {
  RigError,
  RouteNotFoundError,
  SequenceFetchError,
  MalformedTrackDataError,
  PlannerRequestError,
  errorMessage,
} from './agencies/rig/errors';
export type { RigErrorCode } from './agencies/rig/errors';
export { RigEventEmitter, rigEvents, routeFailures$, playbackStatus$, presentedFrames$ } from './agencies/rig/rigEvents';
export type { RigEvent, PlaybackStatus, BufferId } from './agencies/rig/rigEvents';

export * from './agencies/routing';
export * from './agencies/sequences';
export * from './agencies/playback';
export * from './agencies/timeline';
export * from './agencies/lipsync';
export * from './agencies/drivers';
