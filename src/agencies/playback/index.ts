/**
 * Playback Agency - Public API
 */

export { createPlaybackService } from './playbackService';
export type { PlaybackServiceAPI, PlaybackServiceDeps, PlaybackSnapshotInfo } from './playbackService';
export { PlaybackScheduler } from './playbackScheduler';
export type { PlaybackSchedulerDeps } from './playbackScheduler';
export { playbackMachine, playbackStatusOf, currentFrame, isRouteExhausted } from './playbackMachine';
export type { PlaybackMachine } from './playbackMachine';
export { CrossfadeBuffers } from './crossfade';
export type {
  PlayableFrame,
  LoadedSegment,
  PlaybackContext,
  PlaybackEvent,
  PlaybackHostCaps,
  PlaybackConfig,
} from './types';
