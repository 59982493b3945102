/**
 * Idle frame selection.
 *
 * There is no dedicated idle art: a resting state reuses an endpoint frame
 * of a transition sequence at the same pose.
 * - neutral: first frame of the reference sequence (neutral_to_speaking_ah)
 * - expressions with a neutral sequence: the frame at the expression's end
 * - single-hop-only expressions: their designated intermediate's idle frame
 */

import type { RigState } from '../rig/types';
import { NEUTRAL_EXPRESSION } from '../rig/types';
import type { TransitionGraph } from './transitionGraph';
import { DEFAULT_GRAPH, designatedIntermediate, expressionPathId } from './transitionGraph';

export const REFERENCE_IDLE_PATH = 'neutral_to_speaking_ah';

export interface IdleFrameSource {
  pathId: string;
  /** Which endpoint of the sequence depicts the state */
  pick: 'first' | 'last';
  /** State the frame actually depicts (differs when an intermediate is substituted) */
  depicts: RigState;
}

export function idleFrameSource(
  state: RigState,
  graph: TransitionGraph = DEFAULT_GRAPH,
  referencePath: string = REFERENCE_IDLE_PATH
): IdleFrameSource | null {
  if (state.expr === NEUTRAL_EXPRESSION) {
    return { pathId: expressionPathId(referencePath, state.pose), pick: 'first', depicts: state };
  }

  const intoExpr = graph.expressionPaths.find(p => p.start === NEUTRAL_EXPRESSION && p.end === state.expr);
  if (intoExpr) {
    return { pathId: expressionPathId(intoExpr.id, state.pose), pick: 'last', depicts: state };
  }

  const outOfExpr = graph.expressionPaths.find(p => p.start === state.expr && p.end === NEUTRAL_EXPRESSION);
  if (outOfExpr) {
    return { pathId: expressionPathId(outOfExpr.id, state.pose), pick: 'first', depicts: state };
  }

  const intermediate = designatedIntermediate(graph, state.expr);
  if (intermediate === null) return null;
  return idleFrameSource({ expr: intermediate, pose: state.pose }, graph, referencePath);
}
