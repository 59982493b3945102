/**
 * Rig assembly
 * Wires the sequence store, playback and timeline services and the drivers
 * around one config and one event emitter.
 */

import { loadRigConfig } from './config/rigConfig';
import type { RigConfig, RigConfigOverrides } from './config/rigConfig';
import { rigEvents } from './agencies/rig/rigEvents';
import type { RigEventEmitter } from './agencies/rig/rigEvents';
import { DEFAULT_GRAPH } from './agencies/routing/transitionGraph';
import type { TransitionGraph } from './agencies/routing/transitionGraph';
import { HttpSequenceStore } from './agencies/sequences/sequenceStore';
import type { FetchLike, SequenceStore } from './agencies/sequences/types';
import { createPlaybackService } from './agencies/playback/playbackService';
import type { PlaybackServiceAPI } from './agencies/playback/playbackService';
import type { PlaybackHostCaps } from './agencies/playback/types';
import { createTimelineService } from './agencies/timeline/timelineService';
import type { TimelineServiceAPI } from './agencies/timeline/timelineService';
import type { TimelineClock } from './agencies/timeline/transportClock';
import type { ExpressionKeyframe } from './agencies/timeline/types';
import { EmotionPlannerClient } from './agencies/drivers/emotionPlannerClient';
import { createLiveTrackerDriver } from './agencies/drivers/liveTracker';
import type { LiveTrackerDriver } from './agencies/drivers/liveTracker';

export interface RigOptions {
  host: PlaybackHostCaps;
  /** Defaults to the HTTP store at `config.apiBaseUrl` */
  store?: SequenceStore;
  config?: RigConfigOverrides;
  graph?: TransitionGraph;
  events?: RigEventEmitter;
  clock?: TimelineClock;
  /** Used by the HTTP store and the emotion planner */
  fetchImpl?: FetchLike;
  autoStart?: boolean;
}

export interface Rig {
  config: RigConfig;
  playback: PlaybackServiceAPI;
  timeline: TimelineServiceAPI;
  planner: EmotionPlannerClient;
  /** Plan expression keyframes for the loaded phoneme track and put them on the timeline. */
  planEmotions: (transcript: string) => Promise<ExpressionKeyframe[]>;
  /** A tracker driver that targets the playback service directly. */
  createTracker: () => LiveTrackerDriver;
  dispose: () => void;
}

export function createRig(options: RigOptions): Rig {
  const config = loadRigConfig(options.config);
  const events = options.events ?? rigEvents;
  const store = options.store ?? new HttpSequenceStore({ baseUrl: config.apiBaseUrl, fetchImpl: options.fetchImpl });

  const playback = createPlaybackService({
    store,
    host: options.host,
    config,
    graph: options.graph ?? DEFAULT_GRAPH,
    events,
    autoStart: options.autoStart,
  });

  const timeline = createTimelineService({ sink: playback, clock: options.clock, config, events });

  const planner = new EmotionPlannerClient({
    baseUrl: config.apiBaseUrl,
    fetchImpl: options.fetchImpl,
    transitionMs: config.emotionTransitionMs,
  });

  console.log(`[Rig] Ready: ${config.fps}fps, store ${options.store ? 'custom' : config.apiBaseUrl}`);

  return {
    config,
    playback,
    timeline,
    planner,

    async planEmotions(transcript) {
      const durationMs = timeline.getState().durationMs ?? undefined;
      const keyframes = await planner.plan(transcript, timeline.getTracks().phoneme, durationMs);
      timeline.setEmotionKeyframes(keyframes);
      return keyframes;
    },

    createTracker: () => createLiveTrackerDriver(playback, playback.getState().settled),

    dispose() {
      timeline.dispose();
      playback.dispose();
    },
  };
}
