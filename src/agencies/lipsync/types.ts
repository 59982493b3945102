/**
 * LipSync Agency Types
 */

/** One aligned phoneme, as produced by a forced aligner. */
export interface PhonemeInterval {
  startMs: number;
  endMs: number;
  /** ARPABET label with stress marker for vowels, e.g. "AE1", "K" */
  label: string;
}

export interface PhonemeBuilderOptions {
  /** Transition length of each viseme keyframe */
  transitionMs?: number;
  /** Minimum spacing between accepted keyframes */
  cooldownMs?: number;
  /** Transition length of the closing return to neutral */
  trailingTransitionMs?: number;
  /** Prefix of generated keyframe ids */
  idPrefix?: string;
}
