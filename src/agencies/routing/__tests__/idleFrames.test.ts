import { describe, it, expect } from 'vitest';
import { idleFrameSource } from '../idleFrames';
import { BASE_PATHS, createTransitionGraph } from '../transitionGraph';

describe('idleFrameSource', () => {
  it('should use the first frame of the reference sequence for neutral', () => {
    expect(idleFrameSource({ expr: 'neutral', pose: 'nod_up_small' })).toEqual({
      pathId: 'neutral_to_speaking_ah__nod_up_small',
      pick: 'first',
      depicts: { expr: 'neutral', pose: 'nod_up_small' },
    });
  });

  it('should use the last frame of neutral_to_<expr> at the same pose', () => {
    expect(idleFrameSource({ expr: 'concerned', pose: 'tilt_left_small' })).toEqual({
      pathId: 'neutral_to_concerned__tilt_left_small',
      pick: 'last',
      depicts: { expr: 'concerned', pose: 'tilt_left_small' },
    });
    expect(idleFrameSource({ expr: 'blink_closed', pose: 'center' })?.pathId).toBe('neutral_to_blink__center');
  });

  it('should substitute the designated intermediate for single-hop expressions', () => {
    expect(idleFrameSource({ expr: 'surprised_ah', pose: 'center' })).toEqual({
      pathId: 'neutral_to_speaking_ah__center',
      pick: 'last',
      depicts: { expr: 'speaking_ah', pose: 'center' },
    });
    expect(idleFrameSource({ expr: 'happy_big', pose: 'nod_down_small' })).toEqual({
      pathId: 'neutral_to_happy_soft__nod_down_small',
      pick: 'last',
      depicts: { expr: 'happy_soft', pose: 'nod_down_small' },
    });
  });

  it('should use the first frame of an <expr>_to_neutral sequence', () => {
    const graph = createTransitionGraph([{ id: 'concerned_to_neutral', start: 'concerned', end: 'neutral' }]);
    expect(idleFrameSource({ expr: 'concerned', pose: 'center' }, graph)).toEqual({
      pathId: 'concerned_to_neutral__center',
      pick: 'first',
      depicts: { expr: 'concerned', pose: 'center' },
    });
  });

  it('should return null when nothing depicts the expression', () => {
    const graph = createTransitionGraph(BASE_PATHS.filter(p => p.end !== 'blink_closed'));
    expect(idleFrameSource({ expr: 'blink_closed', pose: 'center' }, graph)).toBeNull();
  });
});
