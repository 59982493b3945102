/**
 * Rig Types
 * Shared vocabulary for the sprite rig agencies (routing, playback, timeline, lipsync)
 */

// ---------- Expression / Pose axes ----------
export const EXPRESSIONS = [
  'neutral',
  'happy_soft',
  'happy_big',
  'speaking_ah',
  'surprised_ah',
  'speaking_ee',
  'speaking_uw',
  'oh_round',
  'concerned',
  'blink_closed',
] as const;

export type ExpressionId = (typeof EXPRESSIONS)[number];

export const POSES = [
  'center',
  'tilt_left_small',
  'tilt_right_small',
  'nod_down_small',
  'nod_up_small',
] as const;

export type PoseId = (typeof POSES)[number];

/** One (expression, pose) cell of the rig. */
export interface RigState {
  expr: ExpressionId;
  pose: PoseId;
}

export const NEUTRAL_EXPRESSION: ExpressionId = 'neutral';
export const CENTER_POSE: PoseId = 'center';
export const NEUTRAL_CENTER: RigState = { expr: 'neutral', pose: 'center' };

// ---------- Planned playback ----------
export type SegmentDirection = 'forward' | 'backward';

/** One directed traversal of a pre-rendered sequence. */
export interface Segment {
  pathId: string;
  direction: SegmentDirection;
  from: RigState;
  to: RigState;
}

/** Empty route = already at target, or no plan (jump-cut). */
export type Route = Segment[];

// ---------- Narrow utilities ----------
const expressionSet: ReadonlySet<string> = new Set(EXPRESSIONS);
const poseSet: ReadonlySet<string> = new Set(POSES);

export const isExpressionId = (v: unknown): v is ExpressionId =>
  typeof v === 'string' && expressionSet.has(v);

export const isPoseId = (v: unknown): v is PoseId =>
  typeof v === 'string' && poseSet.has(v);

export const stateKey = (s: RigState) => `${s.expr}__${s.pose}`;

export const sameState = (a: RigState, b: RigState) => a.expr === b.expr && a.pose === b.pose;
