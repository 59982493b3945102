/**
 * Routing Agency - Public API
 * Pure planning of sequence routes between rig states
 */

export {
  BASE_PATHS,
  DEFAULT_GRAPH,
  createTransitionGraph,
  expressionPathId,
  posePathId,
  findExpressionSegment,
  findPoseSegment,
  expressionNeighbors,
  designatedIntermediate,
  planRoute,
  planRouteResult,
  routeDestination,
} from './transitionGraph';
export type { ExpressionPath, TransitionGraph, RouteResult } from './transitionGraph';

export { idleFrameSource, REFERENCE_IDLE_PATH } from './idleFrames';
export type { IdleFrameSource } from './idleFrames';
