/**
 * Transition Graph
 * Plans which pre-rendered sequences connect two rig states.
 *
 * Every sequence is bidirectional: `neutral_to_happy_soft__center` plays
 * forward for neutral -> happy_soft and backward for happy_soft -> neutral.
 *
 * Two kinds of sequence exist:
 * - expression paths, one per pose: `<id>__<pose>`
 * - pose paths, neutral expression only, hub (center) <-> spoke:
 *   `neutral_center_to_neutral_<spoke>`
 *
 * Routing is a breadth-first search over (expr, pose) cells, so
 * expressions that only connect through an intermediate (surprised_ah via
 * speaking_ah, happy_big via happy_soft) need no special branches.
 */

import type { ExpressionId, PoseId, RigState, Route, Segment } from '../rig/types';
import { POSES, NEUTRAL_EXPRESSION, CENTER_POSE, sameState, stateKey } from '../rig/types';
import { RouteNotFoundError } from '../rig/errors';

export interface ExpressionPath {
  id: string;
  start: ExpressionId;
  end: ExpressionId;
}

export const BASE_PATHS: readonly ExpressionPath[] = [
  { id: 'neutral_to_speaking_ah', start: 'neutral', end: 'speaking_ah' },
  { id: 'speaking_ah_to_surprised', start: 'speaking_ah', end: 'surprised_ah' },

  { id: 'neutral_to_speaking_ee', start: 'neutral', end: 'speaking_ee' },
  { id: 'neutral_to_speaking_uw', start: 'neutral', end: 'speaking_uw' },
  { id: 'neutral_to_oh_round', start: 'neutral', end: 'oh_round' },

  { id: 'neutral_to_happy_soft', start: 'neutral', end: 'happy_soft' },
  { id: 'happy_soft_to_happy_big', start: 'happy_soft', end: 'happy_big' },

  { id: 'neutral_to_concerned', start: 'neutral', end: 'concerned' },
  { id: 'neutral_to_blink', start: 'neutral', end: 'blink_closed' },

  // Viseme-to-viseme (lip-sync)
  { id: 'speaking_ah_to_speaking_ee', start: 'speaking_ah', end: 'speaking_ee' },
  { id: 'speaking_ee_to_speaking_ah', start: 'speaking_ee', end: 'speaking_ah' },
  { id: 'speaking_ah_to_speaking_uw', start: 'speaking_ah', end: 'speaking_uw' },
  { id: 'speaking_uw_to_speaking_ah', start: 'speaking_uw', end: 'speaking_ah' },
  { id: 'speaking_ah_to_oh_round', start: 'speaking_ah', end: 'oh_round' },
  { id: 'oh_round_to_speaking_ah', start: 'oh_round', end: 'speaking_ah' },
  { id: 'speaking_ee_to_speaking_uw', start: 'speaking_ee', end: 'speaking_uw' },
  { id: 'speaking_uw_to_speaking_ee', start: 'speaking_uw', end: 'speaking_ee' },
  { id: 'speaking_ee_to_oh_round', start: 'speaking_ee', end: 'oh_round' },
  { id: 'oh_round_to_speaking_ee', start: 'oh_round', end: 'speaking_ee' },
  { id: 'speaking_uw_to_oh_round', start: 'speaking_uw', end: 'oh_round' },
  { id: 'oh_round_to_speaking_uw', start: 'oh_round', end: 'speaking_uw' },
];

export interface TransitionGraph {
  expressionPaths: readonly ExpressionPath[];
  /** Pose every pose transition passes through */
  hubPose: PoseId;
  /** Poses with a neutral sequence to/from the hub */
  spokePoses: readonly PoseId[];
}

export function createTransitionGraph(
  expressionPaths: readonly ExpressionPath[] = BASE_PATHS,
  spokePoses: readonly PoseId[] = POSES.filter(p => p !== CENTER_POSE),
  hubPose: PoseId = CENTER_POSE
): TransitionGraph {
  return { expressionPaths, hubPose, spokePoses };
}

export const DEFAULT_GRAPH: TransitionGraph = createTransitionGraph();

export const expressionPathId = (baseId: string, pose: PoseId) => `${baseId}__${pose}`;

export const posePathId = (hub: PoseId, spoke: PoseId) =>
  `${NEUTRAL_EXPRESSION}_${hub}_to_${NEUTRAL_EXPRESSION}_${spoke}`;

/**
 * Direct expression segment at one pose.
 * A start -> end table match plays forward; the reversed match plays backward.
 */
export function findExpressionSegment(
  graph: TransitionGraph,
  from: RigState,
  to: RigState
): Segment | null {
  if (from.pose !== to.pose || from.expr === to.expr) return null;

  const forward = graph.expressionPaths.find(p => p.start === from.expr && p.end === to.expr);
  if (forward) {
    return { pathId: expressionPathId(forward.id, from.pose), direction: 'forward', from, to };
  }

  const backward = graph.expressionPaths.find(p => p.start === to.expr && p.end === from.expr);
  if (backward) {
    return { pathId: expressionPathId(backward.id, from.pose), direction: 'backward', from, to };
  }

  return null;
}

/** Direct neutral pose segment: hub -> spoke forward, spoke -> hub backward. */
export function findPoseSegment(
  graph: TransitionGraph,
  from: RigState,
  to: RigState
): Segment | null {
  if (from.expr !== NEUTRAL_EXPRESSION || to.expr !== NEUTRAL_EXPRESSION) return null;
  if (from.pose === to.pose) return null;

  if (from.pose === graph.hubPose && graph.spokePoses.includes(to.pose)) {
    return { pathId: posePathId(graph.hubPose, to.pose), direction: 'forward', from, to };
  }
  if (to.pose === graph.hubPose && graph.spokePoses.includes(from.pose)) {
    return { pathId: posePathId(graph.hubPose, from.pose), direction: 'backward', from, to };
  }
  return null;
}

/** Expressions sharing a sequence with `expr`, in table order. */
export function expressionNeighbors(graph: TransitionGraph, expr: ExpressionId): ExpressionId[] {
  const out: ExpressionId[] = [];
  for (const p of graph.expressionPaths) {
    const other = p.start === expr ? p.end : p.end === expr ? p.start : null;
    if (other !== null && other !== expr && !out.includes(other)) out.push(other);
  }
  return out;
}

function outgoingSegments(graph: TransitionGraph, state: RigState): Segment[] {
  const segments: Segment[] = [];

  for (const expr of expressionNeighbors(graph, state.expr)) {
    const seg = findExpressionSegment(graph, state, { expr, pose: state.pose });
    if (seg) segments.push(seg);
  }

  if (state.expr === NEUTRAL_EXPRESSION) {
    const poses = state.pose === graph.hubPose ? graph.spokePoses : [graph.hubPose];
    for (const pose of poses) {
      const seg = findPoseSegment(graph, state, { expr: NEUTRAL_EXPRESSION, pose });
      if (seg) segments.push(seg);
    }
  }

  return segments;
}

/**
 * For an expression with no sequence to or from neutral, the first neighbor
 * that has one. Null when the expression connects to neutral directly (or
 * cannot reach it in one hop).
 */
export function designatedIntermediate(graph: TransitionGraph, expr: ExpressionId): ExpressionId | null {
  if (expr === NEUTRAL_EXPRESSION) return null;
  const neighbors = expressionNeighbors(graph, expr);
  if (neighbors.includes(NEUTRAL_EXPRESSION)) return null;
  return neighbors.find(n => expressionNeighbors(graph, n).includes(NEUTRAL_EXPRESSION)) ?? null;
}

export interface RouteResult {
  route: Route;
  error?: RouteNotFoundError;
}

/**
 * Shortest route between two states, with a RouteNotFoundError instead of
 * an exception when the graph does not connect them.
 */
export function planRouteResult(
  current: RigState,
  target: RigState,
  graph: TransitionGraph = DEFAULT_GRAPH
): RouteResult {
  if (sameState(current, target)) return { route: [] };

  const startKey = stateKey(current);
  const targetKey = stateKey(target);
  const cameFrom = new Map<string, { prevKey: string; segment: Segment }>();
  const visited = new Set<string>([startKey]);
  const queue: RigState[] = [current];

  while (queue.length > 0) {
    const state = queue.shift();
    if (!state) break;

    for (const segment of outgoingSegments(graph, state)) {
      const key = stateKey(segment.to);
      if (visited.has(key)) continue;
      visited.add(key);
      cameFrom.set(key, { prevKey: stateKey(state), segment });

      if (key === targetKey) {
        const route: Route = [];
        let cursor: string = key;
        while (cursor !== startKey) {
          const step = cameFrom.get(cursor);
          if (!step) break;
          route.unshift(step.segment);
          cursor = step.prevKey;
        }
        return { route };
      }

      queue.push(segment.to);
    }
  }

  return { route: [], error: new RouteNotFoundError(current, target) };
}

/** Ordered segments from `current` to `target`; empty when equal or unreachable. */
export function planRoute(
  current: RigState,
  target: RigState,
  graph: TransitionGraph = DEFAULT_GRAPH
): Route {
  return planRouteResult(current, target, graph).route;
}

/** Final state a route arrives at, or null for an empty route. */
export const routeDestination = (route: Route): RigState | null =>
  route.length > 0 ? route[route.length - 1].to : null;
