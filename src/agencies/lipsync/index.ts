/**
 * LipSync Agency - Public API
 * Aligned phonemes in, viseme keyframes out
 */

export {
  buildPhonemeKeyframes,
  validatePhonemeIntervals,
  PHONEME_TRANSITION_MS,
  PHONEME_COOLDOWN_MS,
  TRAILING_TRANSITION_MS,
} from './phonemeVisemeBuilder';
export { parseTextGridPhones } from './textGrid';
export { PHONEME_TO_VISEME, visemeFor, isMappedPhoneme } from './visemeMap';
export type { PhonemeInterval, PhonemeBuilderOptions } from './types';
