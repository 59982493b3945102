/**
 * Synthetic sequences for exercising the rig without an asset backend.
 */

import type { ExpressionId } from '../rig/types';
import { NEUTRAL_EXPRESSION } from '../rig/types';
import type { TransitionGraph } from '../routing/transitionGraph';
import { DEFAULT_GRAPH, expressionPathId, posePathId } from '../routing/transitionGraph';
import { MemorySequenceStore } from './memorySequenceStore';
import type { SequenceManifest } from './types';

export const frameFile = (i: number) => `frame_${String(i).padStart(3, '0')}.png`;

/** Evenly spaced frames from t=0 to t=1. */
export function syntheticManifest(
  pathId: string,
  exprStart: ExpressionId,
  exprEnd: ExpressionId,
  pose: string,
  frameCount = 4
): SequenceManifest {
  const count = Math.max(2, frameCount);
  return {
    path_id: pathId,
    expr_start: exprStart,
    expr_end: exprEnd,
    pose,
    frames: Array.from({ length: count }, (_, i) => ({
      t: i / (count - 1),
      file: frameFile(i),
    })),
  };
}

/** Every sequence id the graph can route through, with its manifest. */
export function syntheticManifests(graph: TransitionGraph = DEFAULT_GRAPH, frameCount = 4): SequenceManifest[] {
  const poses = [graph.hubPose, ...graph.spokePoses];
  const out: SequenceManifest[] = [];

  for (const path of graph.expressionPaths) {
    for (const pose of poses) {
      out.push(syntheticManifest(expressionPathId(path.id, pose), path.start, path.end, pose, frameCount));
    }
  }
  for (const spoke of graph.spokePoses) {
    const pose = `${graph.hubPose}_to_${spoke}`;
    out.push(syntheticManifest(posePathId(graph.hubPose, spoke), NEUTRAL_EXPRESSION, NEUTRAL_EXPRESSION, pose, frameCount));
  }
  return out;
}

export function createSyntheticStore(graph: TransitionGraph = DEFAULT_GRAPH, frameCount = 4): MemorySequenceStore {
  return new MemorySequenceStore(syntheticManifests(graph, frameCount));
}
