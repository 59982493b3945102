/**
 * ARPABET phoneme -> viseme expression table.
 * Vowels carry a stress marker (AE1); anything not listed maps to neutral.
 */

import type { ExpressionId } from '../rig/types';
import { NEUTRAL_EXPRESSION, isExpressionId } from '../rig/types';
import table from './phonemeVisemes.json';

function buildVisemeMap(source: { stressMarkers: string[]; buckets: Record<string, string[]> }): Map<string, ExpressionId> {
  const map = new Map<string, ExpressionId>();
  for (const [viseme, bases] of Object.entries(source.buckets)) {
    if (!isExpressionId(viseme)) throw new Error(`[visemeMap] Unknown viseme bucket "${viseme}"`);
    for (const base of bases) {
      for (const stress of source.stressMarkers) map.set(`${base}${stress}`, viseme);
    }
  }
  return map;
}

export const PHONEME_TO_VISEME: ReadonlyMap<string, ExpressionId> = buildVisemeMap(table);

export function visemeFor(label: string): ExpressionId {
  return PHONEME_TO_VISEME.get(label) ?? NEUTRAL_EXPRESSION;
}

/** True for labels that shape the mouth (mapped vowels). */
export const isMappedPhoneme = (label: string) => PHONEME_TO_VISEME.has(label);
