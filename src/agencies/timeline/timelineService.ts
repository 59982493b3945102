/**
 * Timeline Service
 * Editing API for the three keyframe tracks, the combined/exported timeline,
 * and transport control driving the resolution tick.
 */

import { createActor } from 'xstate';
import type { Actor } from 'xstate';
import type { ExpressionId, PoseId, RigState } from '../rig/types';
import { NEUTRAL_CENTER } from '../rig/types';
import { MalformedTrackDataError } from '../rig/errors';
import { rigEvents } from '../rig/rigEvents';
import type { RigEventEmitter } from '../rig/rigEvents';
import { resolveRigConfig } from '../../config/rigConfig';
import type { RigConfig } from '../../config/rigConfig';
import { buildPhonemeKeyframes } from '../lipsync/phonemeVisemeBuilder';
import { parseTextGridPhones } from '../lipsync/textGrid';
import type { PhonemeInterval } from '../lipsync/types';
import { combine, resolve } from './compositor';
import { toExportTimeline } from './exportTimeline';
import type { ExportTimeline } from './exportTimeline';
import { timelineMachine, transportStatusOf } from './timelineMachine';
import type { TimelineMachine } from './timelineMachine';
import { TimelineScheduler } from './timelineScheduler';
import type { RigTargetSink } from './timelineScheduler';
import { TransportClock } from './transportClock';
import type { TimelineClock } from './transportClock';
import {
  assertValidKeyframe,
  validateExpressionTrack,
  validatePhonemeTrack,
  validatePoseTrack,
} from './trackValidation';
import type {
  AnyKeyframe,
  CombinedKeyframe,
  ExpressionKeyframe,
  PhonemeKeyframe,
  PoseKeyframe,
  TimelineTracks,
  TrackContents,
  TrackKeyframe,
  TrackName,
  TransportStatus,
} from './types';

export interface TimelineState {
  status: TransportStatus;
  positionMs: number;
  durationMs: number | null;
  lastResolved: RigState | null;
  revision: number;
}

export interface TimelineServiceAPI {
  // Manual editor
  addPoseKeyframe: (timeMs: number, pose: PoseId, transitionDurationMs?: number) => PoseKeyframe;
  addExpressionKeyframe: (timeMs: number, expr: ExpressionId, transitionDurationMs?: number) => ExpressionKeyframe;
  addKeyframe: (entry: TrackKeyframe) => void;
  updateKeyframe: (entry: TrackKeyframe) => void;
  deleteKeyframe: (track: TrackName, id: string) => void;
  replaceTrack: (contents: TrackContents) => void;
  clearTracks: (tracks?: TrackName[]) => void;

  // Drivers
  loadPhonemes: (intervals: readonly PhonemeInterval[]) => PhonemeKeyframe[];
  loadTextGrid: (content: string) => PhonemeKeyframe[];
  /** Merges planned keyframes into the expression track, keeping manual edits */
  setEmotionKeyframes: (keyframes: ExpressionKeyframe[]) => void;

  // Derived
  getTracks: () => TimelineTracks;
  getCombinedTimeline: () => CombinedKeyframe[];
  exportTimeline: (id: string) => ExportTimeline;
  resolveAt: (timeMs: number) => RigState;

  // Transport
  play: () => void;
  pause: () => void;
  stop: () => void;
  seek: (positionMs: number) => void;
  setDuration: (durationMs: number | null) => void;

  getState: () => TimelineState;
  subscribe: (callback: (state: TimelineState) => void) => () => void;
  dispose: () => void;
  actor: Actor<TimelineMachine>;
}

export interface TimelineServiceDeps {
  /** Receives every changed target, normally the playback service */
  sink: RigTargetSink;
  clock?: TimelineClock;
  config?: RigConfig;
  events?: RigEventEmitter;
}

export function createTimelineService(deps: TimelineServiceDeps): TimelineServiceAPI {
  const config = deps.config ?? resolveRigConfig();
  const events = deps.events ?? rigEvents;
  const clock = deps.clock ?? new TransportClock();

  const machine = createActor(timelineMachine).start();
  const scheduler = new TimelineScheduler(machine, deps.sink, clock, events, {
    resolutionIntervalMs: config.resolutionIntervalMs,
  });

  // combine() is pure; recompute only after an edit
  let combinedCache: { revision: number; combined: CombinedKeyframe[] } | null = null;

  const context = () => machine.getSnapshot().context;

  const hasId = (track: TrackName, id: string) => {
    const keyframes: readonly AnyKeyframe[] = context().tracks[track];
    return keyframes.some((kf) => kf.id === id);
  };

  // Generated ids step over ids a caller already put on the track
  let keyframeSeq = 0;
  const nextId = (track: TrackName) => {
    let id = `${track}_${++keyframeSeq}`;
    while (hasId(track, id)) id = `${track}_${++keyframeSeq}`;
    return id;
  };

  const addToTrack = (entry: TrackKeyframe) => {
    assertValidKeyframe(entry);
    if (hasId(entry.track, entry.keyframe.id)) {
      throw new MalformedTrackDataError(`${entry.track} keyframe`, [
        `${entry.track} keyframe ${entry.keyframe.id}: duplicate id`,
      ]);
    }
    machine.send({ type: 'ADD_KEYFRAME', ...entry });
  };

  const state = (): TimelineState => {
    const snapshot = machine.getSnapshot();
    return {
      status: transportStatusOf(snapshot),
      positionMs: clock.nowMs(),
      durationMs: snapshot.context.durationMs,
      lastResolved: scheduler.lastResolvedState,
      revision: snapshot.context.revision,
    };
  };

  const subscribers = new Set<(state: TimelineState) => void>();
  const subscription = machine.subscribe(() => {
    const current = state();
    subscribers.forEach((callback) => callback(current));
  });

  const replaceTrack = (contents: TrackContents) => {
    switch (contents.track) {
      case 'pose':
        validatePoseTrack(contents.keyframes);
        break;
      case 'expression':
        validateExpressionTrack(contents.keyframes);
        break;
      case 'phoneme':
        validatePhonemeTrack(contents.keyframes);
        break;
    }
    machine.send({ type: 'REPLACE_TRACK', ...contents });
  };

  const getCombinedTimeline = (): CombinedKeyframe[] => {
    const { tracks, revision } = context();
    if (!combinedCache || combinedCache.revision !== revision) {
      combinedCache = { revision, combined: combine(tracks) };
    }
    return combinedCache.combined;
  };

  const loadPhonemes = (intervals: readonly PhonemeInterval[]) => {
    const keyframes = buildPhonemeKeyframes(intervals, config.phoneme);
    replaceTrack({ track: 'phoneme', keyframes });
    console.log(`[TimelineService] Loaded ${keyframes.length} phoneme keyframes from ${intervals.length} phonemes`);
    return keyframes;
  };

  return {
    addPoseKeyframe(timeMs, pose, transitionDurationMs = config.manualTransitionMs) {
      const keyframe: PoseKeyframe = { id: nextId('pose'), timeMs, targetPose: pose, transitionDurationMs };
      addToTrack({ track: 'pose', keyframe });
      return keyframe;
    },

    addExpressionKeyframe(timeMs, expr, transitionDurationMs = config.manualTransitionMs) {
      const keyframe: ExpressionKeyframe = {
        id: nextId('expression'),
        timeMs,
        targetExpr: expr,
        transitionDurationMs,
      };
      addToTrack({ track: 'expression', keyframe });
      return keyframe;
    },

    addKeyframe: addToTrack,

    updateKeyframe(entry) {
      assertValidKeyframe(entry);
      machine.send({ type: 'UPDATE_KEYFRAME', ...entry });
    },

    deleteKeyframe(track, id) {
      machine.send({ type: 'DELETE_KEYFRAME', track, id });
    },

    replaceTrack,

    clearTracks(tracks) {
      machine.send({ type: 'CLEAR_TRACKS', tracks });
    },

    loadPhonemes,

    loadTextGrid(content) {
      const phones = parseTextGridPhones(content);
      const keyframes = loadPhonemes(phones);
      if (context().durationMs === null && phones.length > 0) {
        machine.send({ type: 'SET_DURATION', durationMs: Math.round(phones[phones.length - 1].endMs) });
      }
      return keyframes;
    },

    setEmotionKeyframes(keyframes) {
      validateExpressionTrack(keyframes, 'emotion keyframes');
      // Stable: at equal times a planned keyframe lands after the one already there
      const merged = [...context().tracks.expression, ...keyframes].sort((a, b) => a.timeMs - b.timeMs);
      replaceTrack({ track: 'expression', keyframes: merged });
    },

    getTracks() {
      return context().tracks;
    },

    getCombinedTimeline,

    exportTimeline(id) {
      return toExportTimeline(id, getCombinedTimeline());
    },

    resolveAt(timeMs) {
      return resolve(context().tracks, timeMs);
    },

    play() {
      const snapshot = machine.getSnapshot();
      if (snapshot.matches('playing')) return;
      const { durationMs } = snapshot.context;
      if (durationMs !== null && clock.nowMs() >= durationMs) clock.seek(0);
      clock.start();
      machine.send({ type: 'PLAY' });
      scheduler.startTicking();
    },

    pause() {
      if (!machine.getSnapshot().matches('playing')) return;
      scheduler.stopTicking();
      clock.pause();
      machine.send({ type: 'PAUSE' });
    },

    stop() {
      scheduler.stopTicking();
      clock.pause();
      clock.seek(0);
      machine.send({ type: 'STOP' });
      scheduler.reset(NEUTRAL_CENTER);
    },

    seek(positionMs) {
      clock.seek(positionMs);
      scheduler.resync();
    },

    setDuration(durationMs) {
      machine.send({ type: 'SET_DURATION', durationMs });
    },

    getState: state,

    subscribe(callback) {
      subscribers.add(callback);
      return () => {
        subscribers.delete(callback);
      };
    },

    dispose() {
      scheduler.dispose();
      subscription.unsubscribe();
      subscribers.clear();
      machine.stop();
    },

    actor: machine,
  };
}
