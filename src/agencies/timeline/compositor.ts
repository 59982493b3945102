/**
 * Multi-track compositor.
 * Pure functions of track contents: nothing here reads a clock or keeps state.
 *
 * Pose:       latest pose keyframe at or before t, else center.
 * Expression: the latest phoneme keyframe at or before t wins while it is
 *             still transitioning (t < time + duration) and is not older than
 *             the latest expression keyframe; otherwise the latest expression
 *             keyframe, else neutral.
 */

import type { RigState } from '../rig/types';
import { CENTER_POSE, NEUTRAL_EXPRESSION, sameState } from '../rig/types';
import type { CombinedKeyframe, ResolutionStep, TimelineTracks } from './types';

interface Timed {
  timeMs: number;
}

/** Latest keyframe with time <= timeMs; equal times resolve to the later entry. */
function latestAtOrBefore<K extends Timed>(track: readonly K[], timeMs: number): K | null {
  let best: K | null = null;
  for (const kf of track) {
    if (kf.timeMs > timeMs) continue;
    if (best === null || kf.timeMs >= best.timeMs) best = kf;
  }
  return best;
}

function lastAt<K extends Timed>(track: readonly K[], timeMs: number): K | null {
  let found: K | null = null;
  for (const kf of track) {
    if (kf.timeMs === timeMs) found = kf;
  }
  return found;
}

export function resolve(tracks: TimelineTracks, timeMs: number): RigState {
  const pose = latestAtOrBefore(tracks.pose, timeMs)?.targetPose ?? CENTER_POSE;

  const expression = latestAtOrBefore(tracks.expression, timeMs);
  const phoneme = latestAtOrBefore(tracks.phoneme, timeMs);

  if (
    phoneme &&
    timeMs < phoneme.timeMs + phoneme.transitionDurationMs &&
    (expression === null || phoneme.timeMs >= expression.timeMs)
  ) {
    return { expr: phoneme.targetExpr, pose };
  }

  return { expr: expression?.targetExpr ?? NEUTRAL_EXPRESSION, pose };
}

/**
 * One combined keyframe per distinct keyframe time across all tracks.
 * Duration comes from the keyframe at exactly that time: phoneme, then expression, then pose.
 */
export function combine(tracks: TimelineTracks): CombinedKeyframe[] {
  const times = new Set<number>();
  for (const kf of tracks.pose) times.add(kf.timeMs);
  for (const kf of tracks.expression) times.add(kf.timeMs);
  for (const kf of tracks.phoneme) times.add(kf.timeMs);

  return [...times]
    .sort((a, b) => a - b)
    .map((timeMs) => {
      const state = resolve(tracks, timeMs);
      const source =
        lastAt(tracks.phoneme, timeMs) ?? lastAt(tracks.expression, timeMs) ?? lastAt(tracks.pose, timeMs);
      return {
        timeMs,
        targetExpr: state.expr,
        targetPose: state.pose,
        transitionDurationMs: source?.transitionDurationMs ?? 0,
      };
    });
}

/** Resolve at `timeMs` and compare with the caller's last resolved state. */
export function resolutionStep(
  tracks: TimelineTracks,
  timeMs: number,
  lastResolved: RigState | null
): ResolutionStep {
  const state = resolve(tracks, timeMs);
  return { state, changed: lastResolved === null || !sameState(lastResolved, state) };
}
