/**
 * Timeline Agency Types
 * Keyframe tracks, combined keyframes and the timeline machine's vocabulary.
 */

import type { ExpressionId, PoseId, RigState } from '../rig/types';

interface KeyframeBase {
  /** Stable identity for editing */
  id: string;
  timeMs: number;
  transitionDurationMs: number;
}

export interface PoseKeyframe extends KeyframeBase {
  targetPose: PoseId;
}

export interface ExpressionKeyframe extends KeyframeBase {
  targetExpr: ExpressionId;
}

export interface PhonemeKeyframe extends KeyframeBase {
  targetExpr: ExpressionId;
  /** Source label, e.g. "AE1" or "K→AE1" for a conjoined pair */
  phoneme: string;
}

export type AnyKeyframe = PoseKeyframe | ExpressionKeyframe | PhonemeKeyframe;

export interface TimelineTracks {
  pose: PoseKeyframe[];
  expression: ExpressionKeyframe[];
  phoneme: PhonemeKeyframe[];
}

export type TrackName = keyof TimelineTracks;

export const TRACK_NAMES: readonly TrackName[] = ['pose', 'expression', 'phoneme'];

export const EMPTY_TRACKS: TimelineTracks = { pose: [], expression: [], phoneme: [] };

/** A keyframe tagged with the track it belongs to. */
export type TrackKeyframe =
  | { track: 'pose'; keyframe: PoseKeyframe }
  | { track: 'expression'; keyframe: ExpressionKeyframe }
  | { track: 'phoneme'; keyframe: PhonemeKeyframe };

/** A whole track's contents tagged with its name. */
export type TrackContents =
  | { track: 'pose'; keyframes: PoseKeyframe[] }
  | { track: 'expression'; keyframes: ExpressionKeyframe[] }
  | { track: 'phoneme'; keyframes: PhonemeKeyframe[] };

export interface CombinedKeyframe {
  timeMs: number;
  targetExpr: ExpressionId;
  targetPose: PoseId;
  transitionDurationMs: number;
}

export interface ResolutionStep {
  state: RigState;
  /** True when `state` differs from the previously resolved one */
  changed: boolean;
}

// ---------- Machine ----------

export type TransportStatus = 'stopped' | 'playing' | 'paused';

export interface TimelineContext {
  tracks: TimelineTracks;
  /** Playback stops on its own once the clock reaches this (null = open-ended) */
  durationMs: number | null;
  /** Bumped on every edit; lets observers skip recomputation */
  revision: number;
}

export type TimelineEvent =
  | ({ type: 'ADD_KEYFRAME' } & TrackKeyframe)
  | ({ type: 'UPDATE_KEYFRAME' } & TrackKeyframe)
  | { type: 'DELETE_KEYFRAME'; track: TrackName; id: string }
  | ({ type: 'REPLACE_TRACK' } & TrackContents)
  | { type: 'CLEAR_TRACKS'; tracks?: TrackName[] }
  | { type: 'SET_DURATION'; durationMs: number | null }
  | { type: 'PLAY' }
  | { type: 'PAUSE' }
  | { type: 'STOP' };
