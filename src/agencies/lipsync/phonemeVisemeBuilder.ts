/**
 * Phoneme -> viseme keyframe builder.
 *
 * Scans aligned phonemes left to right:
 * - a neutral phoneme (consonant, silence) directly followed by a mapped vowel
 *   emits one keyframe at the consonant's start, targeting the vowel's viseme;
 *   the pair is consumed together whether or not the keyframe is emitted
 * - a keyframe is only emitted when the viseme differs from the current one
 *   and at least `cooldownMs` passed since the last accepted keyframe
 * - a track ending away from neutral gets a closing keyframe at the last
 *   phoneme's end
 */

import type { ExpressionId } from '../rig/types';
import { NEUTRAL_EXPRESSION } from '../rig/types';
import { MalformedTrackDataError } from '../rig/errors';
import type { PhonemeKeyframe } from '../timeline/types';
import type { PhonemeBuilderOptions, PhonemeInterval } from './types';
import { isMappedPhoneme, visemeFor } from './visemeMap';

export const PHONEME_TRANSITION_MS = 500;
export const PHONEME_COOLDOWN_MS = 175;
export const TRAILING_TRANSITION_MS = 300;

/** Throws MalformedTrackDataError listing every problem found. */
export function validatePhonemeIntervals(intervals: readonly PhonemeInterval[]): void {
  const issues: string[] = [];
  intervals.forEach((p, i) => {
    if (!Number.isFinite(p.startMs) || !Number.isFinite(p.endMs)) {
      issues.push(`phoneme ${i}: non-finite time`);
    } else if (p.endMs < p.startMs) {
      issues.push(`phoneme ${i}: ends before it starts`);
    }
    if (p.label.trim() === '') issues.push(`phoneme ${i}: empty label`);
    if (i > 0 && p.startMs < intervals[i - 1].startMs) issues.push(`phoneme ${i}: out of order`);
  });
  if (issues.length > 0) throw new MalformedTrackDataError('phoneme intervals', issues);
}

export function buildPhonemeKeyframes(
  intervals: readonly PhonemeInterval[],
  options: PhonemeBuilderOptions = {}
): PhonemeKeyframe[] {
  validatePhonemeIntervals(intervals);

  const {
    transitionMs = PHONEME_TRANSITION_MS,
    cooldownMs = PHONEME_COOLDOWN_MS,
    trailingTransitionMs = TRAILING_TRANSITION_MS,
    idPrefix = 'ph',
  } = options;

  const keyframes: PhonemeKeyframe[] = [];
  let current: ExpressionId = NEUTRAL_EXPRESSION;
  // First keyframe is always allowed
  let lastAcceptedMs = -cooldownMs;

  const emit = (startMs: number, targetExpr: ExpressionId, phoneme: string) => {
    if (targetExpr === current || startMs - lastAcceptedMs < cooldownMs) return;
    keyframes.push({
      id: `${idPrefix}${keyframes.length}`,
      timeMs: Math.round(startMs),
      targetExpr,
      transitionDurationMs: transitionMs,
      phoneme,
    });
    current = targetExpr;
    lastAcceptedMs = startMs;
  };

  let i = 0;
  while (i < intervals.length) {
    const phoneme = intervals[i];
    const viseme = visemeFor(phoneme.label);
    const next = i + 1 < intervals.length ? intervals[i + 1] : null;

    if (viseme === NEUTRAL_EXPRESSION && next && isMappedPhoneme(next.label)) {
      emit(phoneme.startMs, visemeFor(next.label), `${phoneme.label}→${next.label}`);
      i += 2;
      continue;
    }

    emit(phoneme.startMs, viseme, phoneme.label);
    i++;
  }

  if (intervals.length > 0 && current !== NEUTRAL_EXPRESSION) {
    keyframes.push({
      id: `${idPrefix}${keyframes.length}`,
      timeMs: Math.round(intervals[intervals.length - 1].endMs),
      targetExpr: NEUTRAL_EXPRESSION,
      transitionDurationMs: trailingTransitionMs,
      phoneme: '',
    });
  }

  return keyframes;
}
