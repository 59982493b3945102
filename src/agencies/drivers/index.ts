/**
 * Drivers Agency - Public API
 * Adapters that feed keyframes or live targets into the rig
 */

export {
  EmotionPlannerClient,
  buildEmotionPlanRequest,
  parseEmotionKeyframes,
  EMOTION_TRANSITION_MS,
  FALLBACK_DURATION_MS,
} from './emotionPlannerClient';
export type { EmotionPlannerOptions, EmotionPlanRequest, PlannerPhonemeEntry } from './emotionPlannerClient';
export { discretizeTrackerSample, createLiveTrackerDriver, TRACKER_THRESHOLDS } from './liveTracker';
export type { HeadAngles, TrackerSample, LiveTrackerDriver } from './liveTracker';
