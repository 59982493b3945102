import { describe, it, expect } from 'vitest';
import { buildPhonemeKeyframes, validatePhonemeIntervals } from '../phonemeVisemeBuilder';
import { visemeFor, isMappedPhoneme } from '../visemeMap';
import type { PhonemeInterval } from '../types';
import { MalformedTrackDataError } from '../../rig/errors';

const ph = (startMs: number, endMs: number, label: string): PhonemeInterval => ({ startMs, endMs, label });

describe('visemeFor', () => {
  it('should map stressed vowels to their bucket', () => {
    expect(visemeFor('AE1')).toBe('speaking_ee');
    expect(visemeFor('ER2')).toBe('speaking_ah');
    expect(visemeFor('UH0')).toBe('speaking_uw');
    expect(visemeFor('AW1')).toBe('oh_round');
  });

  it('should map consonants, silence and unstressed labels to neutral', () => {
    expect(visemeFor('K')).toBe('neutral');
    expect(visemeFor('sil')).toBe('neutral');
    expect(visemeFor('AE')).toBe('neutral');
    expect(isMappedPhoneme('K')).toBe(false);
    expect(isMappedPhoneme('OY2')).toBe(true);
  });
});

describe('buildPhonemeKeyframes', () => {
  it('should conjoin a consonant with the following vowel', () => {
    const keyframes = buildPhonemeKeyframes([ph(0, 80, 'K'), ph(80, 220, 'AE1'), ph(220, 300, 'T')]);

    expect(keyframes).toEqual([
      { id: 'ph0', timeMs: 0, targetExpr: 'speaking_ee', transitionDurationMs: 500, phoneme: 'K→AE1' },
      { id: 'ph1', timeMs: 220, targetExpr: 'neutral', transitionDurationMs: 500, phoneme: 'T' },
    ]);
  });

  it('should drop a keyframe inside the cooldown and close with a return to neutral', () => {
    const keyframes = buildPhonemeKeyframes([ph(0, 100, 'AA1'), ph(100, 400, 'IY1')]);

    expect(keyframes).toEqual([
      { id: 'ph0', timeMs: 0, targetExpr: 'speaking_ah', transitionDurationMs: 500, phoneme: 'AA1' },
      { id: 'ph1', timeMs: 400, targetExpr: 'neutral', transitionDurationMs: 300, phoneme: '' },
    ]);
  });

  it('should not repeat the current viseme', () => {
    const keyframes = buildPhonemeKeyframes([ph(0, 100, 'AA1'), ph(200, 300, 'AH0')]);

    expect(keyframes.map(k => [k.timeMs, k.targetExpr])).toEqual([
      [0, 'speaking_ah'],
      [300, 'neutral'],
    ]);
  });

  it('should consume both phonemes of a conjoined pair skipped by cooldown', () => {
    const keyframes = buildPhonemeKeyframes([ph(0, 100, 'IY1'), ph(100, 200, 'K'), ph(200, 300, 'AA1')]);

    // AA1 alone at 200 would pass the cooldown, but it belongs to the skipped pair
    expect(keyframes.map(k => [k.timeMs, k.targetExpr, k.phoneme])).toEqual([
      [0, 'speaking_ee', 'IY1'],
      [300, 'neutral', ''],
    ]);
  });

  it('should emit nothing for consonants only', () => {
    expect(buildPhonemeKeyframes([ph(0, 50, 'S'), ph(50, 100, 'T')])).toEqual([]);
    expect(buildPhonemeKeyframes([])).toEqual([]);
  });

  it('should round keyframe times to whole milliseconds', () => {
    const keyframes = buildPhonemeKeyframes([ph(12.6, 90.2, 'OW1')]);

    expect(keyframes.map(k => k.timeMs)).toEqual([13, 90]);
  });

  it('should honour custom timings', () => {
    const keyframes = buildPhonemeKeyframes([ph(0, 100, 'AA1'), ph(100, 400, 'IY1')], {
      cooldownMs: 50,
      transitionMs: 200,
      trailingTransitionMs: 120,
      idPrefix: 'lip_',
    });

    expect(keyframes).toEqual([
      { id: 'lip_0', timeMs: 0, targetExpr: 'speaking_ah', transitionDurationMs: 200, phoneme: 'AA1' },
      { id: 'lip_1', timeMs: 100, targetExpr: 'speaking_ee', transitionDurationMs: 200, phoneme: 'IY1' },
      { id: 'lip_2', timeMs: 400, targetExpr: 'neutral', transitionDurationMs: 120, phoneme: '' },
    ]);
  });

  it('should keep accepted keyframes at least 175ms apart', () => {
    const labels = ['K', 'AE1', 'T', 'OW1', 'S', 'IY1', 'AA1', 'M', 'UW1', 'ER0', 'sil', 'EY2'];
    const intervals: PhonemeInterval[] = [];
    let t = 0;
    for (let i = 0; i < 120; i++) {
      const duration = 40 + ((i * 37) % 120);
      intervals.push(ph(t, t + duration, labels[i % labels.length]));
      t += duration;
    }

    const accepted = buildPhonemeKeyframes(intervals).filter(k => k.phoneme !== '');

    expect(accepted.length).toBeGreaterThan(10);
    for (let i = 1; i < accepted.length; i++) {
      expect(accepted[i].timeMs - accepted[i - 1].timeMs).toBeGreaterThanOrEqual(175);
      expect(accepted[i].targetExpr).not.toBe(accepted[i - 1].targetExpr);
    }
  });
});

describe('validatePhonemeIntervals', () => {
  it('should reject malformed intervals with every issue listed', () => {
    try {
      validatePhonemeIntervals([ph(100, 50, 'AA1'), ph(20, 40, ' '), ph(Number.NaN, 10, 'K')]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedTrackDataError);
      if (err instanceof MalformedTrackDataError) {
        expect(err.issues).toEqual([
          'phoneme 0: ends before it starts',
          'phoneme 1: empty label',
          'phoneme 1: out of order',
          'phoneme 2: non-finite time',
        ]);
      }
    }
  });

  it('should make the builder refuse bad input', () => {
    expect(() => buildPhonemeKeyframes([ph(0, 10, 'AA1'), ph(-5, 10, 'K')])).toThrow(MalformedTrackDataError);
  });
});
