/**
 * Sequence Store Types
 * Wire shape of a pre-rendered sequence manifest and the store contract.
 */

import type { ExpressionId } from '../rig/types';

/** One frame: normalized time in [0, 1] and the image file name. */
export interface SequenceFrame {
  t: number;
  file: string;
}

/**
 * Manifest as served by the store (field names are part of the wire format).
 * Frames ascend by `t`; `t=0` depicts `expr_start`, `t=1` depicts `expr_end`.
 */
export interface SequenceManifest {
  path_id: string;
  expr_start: ExpressionId;
  expr_end: ExpressionId;
  /** The pose shown, or `<from>_to_<to>` for a pose transition */
  pose: string;
  frames: SequenceFrame[];
}

export interface SequenceStore {
  /** Rejects with SequenceFetchError when the sequence is missing or invalid */
  fetchSequence(pathId: string): Promise<SequenceManifest>;
  frameUrl(pathId: string, file: string): string;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
