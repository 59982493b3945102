/**
 * Ingestion checks for keyframes coming from drivers and editors.
 * Bad data is rejected with MalformedTrackDataError before it reaches a track.
 */

import { isExpressionId, isPoseId } from '../rig/types';
import { MalformedTrackDataError } from '../rig/errors';
import type { AnyKeyframe, ExpressionKeyframe, PhonemeKeyframe, PoseKeyframe, TrackKeyframe } from './types';

const isTime = (v: number) => Number.isFinite(v) && v >= 0;

function baseIssues(kf: AnyKeyframe, label: string): string[] {
  const issues: string[] = [];
  if (kf.id === '') issues.push(`${label}: empty id`);
  if (!isTime(kf.timeMs)) issues.push(`${label}: invalid timeMs ${kf.timeMs}`);
  if (!isTime(kf.transitionDurationMs)) {
    issues.push(`${label}: invalid transitionDurationMs ${kf.transitionDurationMs}`);
  }
  return issues;
}

function keyframeIssues(entry: TrackKeyframe, label: string): string[] {
  const issues = baseIssues(entry.keyframe, label);
  switch (entry.track) {
    case 'pose':
      if (!isPoseId(entry.keyframe.targetPose)) issues.push(`${label}: unknown pose ${entry.keyframe.targetPose}`);
      break;
    case 'expression':
    case 'phoneme':
      if (!isExpressionId(entry.keyframe.targetExpr)) {
        issues.push(`${label}: unknown expression ${entry.keyframe.targetExpr}`);
      }
      break;
  }
  return issues;
}

/** Single keyframe added or edited by hand. */
export function assertValidKeyframe(entry: TrackKeyframe): void {
  const issues = keyframeIssues(entry, `${entry.track} keyframe ${entry.keyframe.id}`);
  if (issues.length > 0) throw new MalformedTrackDataError(`${entry.track} keyframe`, issues);
}

function orderIssues(keyframes: readonly AnyKeyframe[], source: string): string[] {
  const issues: string[] = [];
  const ids = new Set<string>();
  keyframes.forEach((kf, i) => {
    if (i > 0 && kf.timeMs < keyframes[i - 1].timeMs) {
      issues.push(`${source}[${i}]: time ${kf.timeMs} before previous ${keyframes[i - 1].timeMs}`);
    }
    if (ids.has(kf.id)) issues.push(`${source}[${i}]: duplicate id ${kf.id}`);
    ids.add(kf.id);
  });
  return issues;
}

/**
 * A whole track delivered by a driver must be time-ordered with unique ids.
 * Returns the keyframes unchanged when valid.
 */
export function validatePoseTrack(keyframes: PoseKeyframe[], source = 'pose track'): PoseKeyframe[] {
  const issues = keyframes.flatMap((keyframe, i) => keyframeIssues({ track: 'pose', keyframe }, `${source}[${i}]`));
  issues.push(...orderIssues(keyframes, source));
  if (issues.length > 0) throw new MalformedTrackDataError(source, issues);
  return keyframes;
}

export function validateExpressionTrack(
  keyframes: ExpressionKeyframe[],
  source = 'expression track'
): ExpressionKeyframe[] {
  const issues = keyframes.flatMap((keyframe, i) =>
    keyframeIssues({ track: 'expression', keyframe }, `${source}[${i}]`)
  );
  issues.push(...orderIssues(keyframes, source));
  if (issues.length > 0) throw new MalformedTrackDataError(source, issues);
  return keyframes;
}

export function validatePhonemeTrack(keyframes: PhonemeKeyframe[], source = 'phoneme track'): PhonemeKeyframe[] {
  const issues = keyframes.flatMap((keyframe, i) =>
    keyframeIssues({ track: 'phoneme', keyframe }, `${source}[${i}]`)
  );
  issues.push(...orderIssues(keyframes, source));
  if (issues.length > 0) throw new MalformedTrackDataError(source, issues);
  return keyframes;
}
