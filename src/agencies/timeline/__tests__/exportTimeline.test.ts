import { describe, it, expect } from 'vitest';
import { fromExportTimeline, parseExportTimeline, toExportTimeline } from '../exportTimeline';
import { MalformedTrackDataError } from '../../rig/errors';
import type { CombinedKeyframe } from '../types';

const combined: CombinedKeyframe[] = [
  { timeMs: 0, targetExpr: 'happy_soft', targetPose: 'center', transitionDurationMs: 300 },
  { timeMs: 200, targetExpr: 'speaking_ah', targetPose: 'tilt_left_small', transitionDurationMs: 500 },
];

describe('toExportTimeline', () => {
  it('should write snake_case keyframes under the id', () => {
    expect(toExportTimeline('clip-1', combined)).toEqual({
      id: 'clip-1',
      keyframes: [
        { time_ms: 0, target_expr: 'happy_soft', target_pose: 'center', transition_duration_ms: 300 },
        { time_ms: 200, target_expr: 'speaking_ah', target_pose: 'tilt_left_small', transition_duration_ms: 500 },
      ],
    });
  });

  it('should read back through JSON', () => {
    const raw: unknown = JSON.parse(JSON.stringify(toExportTimeline('clip-1', combined)));

    expect(fromExportTimeline(parseExportTimeline(raw))).toEqual(combined);
  });
});

describe('parseExportTimeline', () => {
  it('should reject a non-object', () => {
    expect(() => parseExportTimeline('nope')).toThrow('Malformed export timeline: not an object');
  });

  it('should reject missing keyframes', () => {
    expect(() => parseExportTimeline({ id: 'x' })).toThrow('Malformed export timeline: keyframes is not an array');
  });

  it('should list bad fields and ordering problems', () => {
    try {
      parseExportTimeline({
        id: '',
        keyframes: [
          { time_ms: 100, target_expr: 'neutral', target_pose: 'center', transition_duration_ms: 0 },
          { time_ms: 100, target_expr: 'neutral', target_pose: 'center', transition_duration_ms: 0 },
          { time_ms: 200, target_expr: 'grin', target_pose: 'center', transition_duration_ms: -1 },
          7,
        ],
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedTrackDataError);
      if (err instanceof MalformedTrackDataError) {
        expect(err.issues).toEqual([
          'missing id',
          'keyframes[1] out of order',
          'keyframes[2].target_expr unknown',
          'keyframes[2].transition_duration_ms invalid',
          'keyframes[3] is not an object',
        ]);
      }
    }
  });
});
