/**
 * Interchange format for offline renderers:
 * { id, keyframes: [{ time_ms, target_expr, target_pose, transition_duration_ms }] }
 */

import { isExpressionId, isPoseId } from '../rig/types';
import type { ExpressionId, PoseId } from '../rig/types';
import { MalformedTrackDataError } from '../rig/errors';
import type { CombinedKeyframe } from './types';

export interface ExportKeyframe {
  time_ms: number;
  target_expr: ExpressionId;
  target_pose: PoseId;
  transition_duration_ms: number;
}

export interface ExportTimeline {
  id: string;
  keyframes: ExportKeyframe[];
}

export function toExportTimeline(id: string, combined: readonly CombinedKeyframe[]): ExportTimeline {
  return {
    id,
    keyframes: combined.map(kf => ({
      time_ms: kf.timeMs,
      target_expr: kf.targetExpr,
      target_pose: kf.targetPose,
      transition_duration_ms: kf.transitionDurationMs,
    })),
  };
}

export function fromExportTimeline(exported: ExportTimeline): CombinedKeyframe[] {
  return exported.keyframes.map(kf => ({
    timeMs: kf.time_ms,
    targetExpr: kf.target_expr,
    targetPose: kf.target_pose,
    transitionDurationMs: kf.transition_duration_ms,
  }));
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

const isNonNegative = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v) && v >= 0;

/** Validate JSON read back from disk or the wire; keyframes must ascend strictly by time. */
export function parseExportTimeline(raw: unknown): ExportTimeline {
  const issues: string[] = [];
  if (!isRecord(raw)) throw new MalformedTrackDataError('export timeline', ['not an object']);

  const { id, keyframes } = raw;
  if (typeof id !== 'string' || id === '') issues.push('missing id');
  if (!Array.isArray(keyframes)) {
    issues.push('keyframes is not an array');
    throw new MalformedTrackDataError('export timeline', issues);
  }

  const parsed: ExportKeyframe[] = [];
  keyframes.forEach((kf: unknown, i) => {
    if (!isRecord(kf)) {
      issues.push(`keyframes[${i}] is not an object`);
      return;
    }
    const { time_ms, target_expr, target_pose, transition_duration_ms } = kf;
    if (!isNonNegative(time_ms)) issues.push(`keyframes[${i}].time_ms invalid`);
    if (!isExpressionId(target_expr)) issues.push(`keyframes[${i}].target_expr unknown`);
    if (!isPoseId(target_pose)) issues.push(`keyframes[${i}].target_pose unknown`);
    if (!isNonNegative(transition_duration_ms)) issues.push(`keyframes[${i}].transition_duration_ms invalid`);
    if (
      isNonNegative(time_ms) &&
      isExpressionId(target_expr) &&
      isPoseId(target_pose) &&
      isNonNegative(transition_duration_ms)
    ) {
      const prev = parsed[parsed.length - 1];
      if (prev && time_ms <= prev.time_ms) issues.push(`keyframes[${i}] out of order`);
      parsed.push({ time_ms, target_expr, target_pose, transition_duration_ms });
    }
  });

  if (issues.length > 0 || typeof id !== 'string') throw new MalformedTrackDataError('export timeline', issues);
  return { id, keyframes: parsed };
}
