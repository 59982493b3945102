import { describe, it, expect } from 'vitest';
import {
  BASE_PATHS,
  DEFAULT_GRAPH,
  createTransitionGraph,
  designatedIntermediate,
  findPoseSegment,
  planRoute,
  planRouteResult,
  routeDestination,
} from '../transitionGraph';
import { EXPRESSIONS, POSES } from '../../rig/types';
import type { RigState } from '../../rig/types';
import { RouteNotFoundError } from '../../rig/errors';

const allStates: RigState[] = EXPRESSIONS.flatMap(expr => POSES.map(pose => ({ expr, pose })));

describe('planRoute', () => {
  describe('No-op', () => {
    it('should return an empty route for every state to itself', () => {
      for (const s of allStates) {
        expect(planRoute(s, s)).toEqual([]);
      }
    });
  });

  describe('Direct expression edges', () => {
    it('should play neutral_to_happy_soft forward from neutral', () => {
      const route = planRoute({ expr: 'neutral', pose: 'center' }, { expr: 'happy_soft', pose: 'center' });

      expect(route).toEqual([
        {
          pathId: 'neutral_to_happy_soft__center',
          direction: 'forward',
          from: { expr: 'neutral', pose: 'center' },
          to: { expr: 'happy_soft', pose: 'center' },
        },
      ]);
    });

    it('should play the same sequence backward to return to neutral', () => {
      const route = planRoute({ expr: 'happy_soft', pose: 'center' }, { expr: 'neutral', pose: 'center' });

      expect(route).toHaveLength(1);
      expect(route[0].pathId).toBe('neutral_to_happy_soft__center');
      expect(route[0].direction).toBe('backward');
    });

    it('should prefer the forward table entry when both directions are listed', () => {
      const route = planRoute({ expr: 'speaking_ee', pose: 'nod_up_small' }, { expr: 'speaking_ah', pose: 'nod_up_small' });

      expect(route).toHaveLength(1);
      expect(route[0].pathId).toBe('speaking_ee_to_speaking_ah__nod_up_small');
      expect(route[0].direction).toBe('forward');
    });
  });

  describe('Routing via neutral', () => {
    it('should hop surprised_ah through speaking_ah to reach neutral', () => {
      const route = planRoute({ expr: 'surprised_ah', pose: 'center' }, { expr: 'neutral', pose: 'center' });

      expect(route.map(s => [s.pathId, s.direction])).toEqual([
        ['speaking_ah_to_surprised__center', 'backward'],
        ['neutral_to_speaking_ah__center', 'backward'],
      ]);
      expect(route[0].to).toEqual({ expr: 'speaking_ah', pose: 'center' });
    });

    it('should hop through happy_soft to reach happy_big from neutral', () => {
      const route = planRoute({ expr: 'neutral', pose: 'tilt_left_small' }, { expr: 'happy_big', pose: 'tilt_left_small' });

      expect(route.map(s => [s.pathId, s.direction])).toEqual([
        ['neutral_to_happy_soft__tilt_left_small', 'forward'],
        ['happy_soft_to_happy_big__tilt_left_small', 'forward'],
      ]);
    });

    it('should detour through neutral between unconnected expressions', () => {
      const route = planRoute({ expr: 'concerned', pose: 'center' }, { expr: 'blink_closed', pose: 'center' });

      expect(route.map(s => s.pathId)).toEqual([
        'neutral_to_concerned__center',
        'neutral_to_blink__center',
      ]);
      expect(route.map(s => s.direction)).toEqual(['backward', 'forward']);
    });

    it('should chain both single-hop detours between happy_big and surprised_ah', () => {
      const route = planRoute({ expr: 'happy_big', pose: 'center' }, { expr: 'surprised_ah', pose: 'center' });

      expect(route.map(s => s.to.expr)).toEqual(['happy_soft', 'neutral', 'speaking_ah', 'surprised_ah']);
    });

    it('should skip neutral when a viseme edge is shorter', () => {
      const route = planRoute({ expr: 'surprised_ah', pose: 'center' }, { expr: 'speaking_ee', pose: 'center' });

      expect(route.map(s => [s.pathId, s.direction])).toEqual([
        ['speaking_ah_to_surprised__center', 'backward'],
        ['speaking_ah_to_speaking_ee__center', 'forward'],
      ]);
      expect(route.some(s => s.to.expr === 'neutral')).toBe(false);
    });
  });

  describe('Cross-pose routing', () => {
    it('should neutralize, hop via center and re-express', () => {
      const route = planRoute(
        { expr: 'happy_soft', pose: 'tilt_left_small' },
        { expr: 'concerned', pose: 'tilt_right_small' }
      );

      expect(route.map(s => [s.pathId, s.direction])).toEqual([
        ['neutral_to_happy_soft__tilt_left_small', 'backward'],
        ['neutral_center_to_neutral_tilt_left_small', 'backward'],
        ['neutral_center_to_neutral_tilt_right_small', 'forward'],
        ['neutral_to_concerned__tilt_right_small', 'forward'],
      ]);
    });

    it('should use a single pose segment when one side is center', () => {
      const route = planRoute({ expr: 'neutral', pose: 'center' }, { expr: 'neutral', pose: 'nod_down_small' });

      expect(route).toEqual([
        {
          pathId: 'neutral_center_to_neutral_nod_down_small',
          direction: 'forward',
          from: { expr: 'neutral', pose: 'center' },
          to: { expr: 'neutral', pose: 'nod_down_small' },
        },
      ]);
    });

    it('should never connect two non-center poses directly', () => {
      expect(
        findPoseSegment(DEFAULT_GRAPH, { expr: 'neutral', pose: 'nod_up_small' }, { expr: 'neutral', pose: 'nod_down_small' })
      ).toBeNull();
    });

    it('should only change pose while the expression is neutral', () => {
      const route = planRoute({ expr: 'speaking_uw', pose: 'nod_up_small' }, { expr: 'oh_round', pose: 'center' });

      for (const seg of route) {
        if (seg.from.pose !== seg.to.pose) {
          expect(seg.from.expr).toBe('neutral');
          expect(seg.to.expr).toBe('neutral');
        }
      }
      expect(route).toHaveLength(3);
    });
  });

  describe('Route integrity', () => {
    it('should produce chained segments ending at the target for every pair', () => {
      for (const from of allStates) {
        for (const to of allStates) {
          const route = planRoute(from, to);
          if (from.expr === to.expr && from.pose === to.pose) continue;

          expect(route.length).toBeGreaterThan(0);
          expect(route[0].from).toEqual(from);
          expect(routeDestination(route)).toEqual(to);
          for (let i = 1; i < route.length; i++) {
            expect(route[i].from).toEqual(route[i - 1].to);
          }
        }
      }
    });

    it('should be deterministic', () => {
      const a = planRoute({ expr: 'oh_round', pose: 'tilt_left_small' }, { expr: 'happy_big', pose: 'nod_up_small' });
      const b = planRoute({ expr: 'oh_round', pose: 'tilt_left_small' }, { expr: 'happy_big', pose: 'nod_up_small' });
      expect(a).toEqual(b);
    });
  });

  describe('RouteNotFound', () => {
    it('should return an empty route and an error when no path exists', () => {
      const graph = createTransitionGraph(BASE_PATHS.filter(p => p.end !== 'blink_closed'));
      const result = planRouteResult({ expr: 'neutral', pose: 'center' }, { expr: 'blink_closed', pose: 'center' }, graph);

      expect(result.route).toEqual([]);
      expect(result.error).toBeInstanceOf(RouteNotFoundError);
      expect(result.error?.code).toBe('ROUTE_NOT_FOUND');
      expect(result.error?.message).toBe('No route from neutral__center to blink_closed__center');
    });

    it('should not raise from planRoute when unreachable', () => {
      const graph = createTransitionGraph(BASE_PATHS, []);
      expect(planRoute({ expr: 'neutral', pose: 'center' }, { expr: 'neutral', pose: 'tilt_left_small' }, graph)).toEqual([]);
    });

    it('should report no error for equal states', () => {
      expect(planRouteResult({ expr: 'concerned', pose: 'center' }, { expr: 'concerned', pose: 'center' })).toEqual({ route: [] });
    });
  });
});

describe('designatedIntermediate', () => {
  it('should find the single-hop intermediates from the table', () => {
    expect(designatedIntermediate(DEFAULT_GRAPH, 'surprised_ah')).toBe('speaking_ah');
    expect(designatedIntermediate(DEFAULT_GRAPH, 'happy_big')).toBe('happy_soft');
  });

  it('should return null for expressions connected to neutral', () => {
    expect(designatedIntermediate(DEFAULT_GRAPH, 'concerned')).toBeNull();
    expect(designatedIntermediate(DEFAULT_GRAPH, 'neutral')).toBeNull();
  });
});
