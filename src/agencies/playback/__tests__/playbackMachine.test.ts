import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createActor } from 'xstate';
import type { Actor } from 'xstate';
import { playbackMachine, currentFrame, playbackStatusOf } from '../playbackMachine';
import type { PlaybackMachine } from '../playbackMachine';
import type { LoadedSegment } from '../types';
import type { RigState, Segment } from '../../rig/types';

const NEUTRAL: RigState = { expr: 'neutral', pose: 'center' };
const HAPPY: RigState = { expr: 'happy_soft', pose: 'center' };
const CONCERNED: RigState = { expr: 'concerned', pose: 'center' };

const segment = (pathId: string, from: RigState, to: RigState): Segment => ({
  pathId,
  direction: 'forward',
  from,
  to,
});

const loaded = (seg: Segment, count: number): LoadedSegment => ({
  segment: seg,
  frames: Array.from({ length: count }, (_, i) => ({
    t: i / (count - 1),
    file: `f${i}.png`,
    url: `${seg.pathId}/f${i}.png`,
  })),
});

describe('PlaybackMachine', () => {
  let machine: Actor<PlaybackMachine>;
  const toHappy = segment('neutral_to_happy_soft__center', NEUTRAL, HAPPY);

  beforeEach(() => {
    machine = createActor(playbackMachine).start();
  });

  afterEach(() => {
    machine.stop();
  });

  describe('Initial State', () => {
    it('should start idle at neutral@center', () => {
      const snapshot = machine.getSnapshot();
      expect(playbackStatusOf(snapshot)).toBe('idle');
      expect(snapshot.context.settled).toEqual(NEUTRAL);
      expect(snapshot.context.target).toEqual(NEUTRAL);
      expect(snapshot.context.routeId).toBe(0);
    });
  });

  describe('Loading', () => {
    it('should enter loading when a route is planned', () => {
      machine.send({ type: 'ROUTE_PLANNED', routeId: 1, target: HAPPY, route: [toHappy] });

      const snapshot = machine.getSnapshot();
      expect(playbackStatusOf(snapshot)).toBe('loading');
      expect(snapshot.context.target).toEqual(HAPPY);
      expect(snapshot.context.settled).toEqual(NEUTRAL);
      expect(currentFrame(snapshot.context)).toBeNull();
    });

    it('should ignore segments loaded for another route', () => {
      machine.send({ type: 'ROUTE_PLANNED', routeId: 2, target: HAPPY, route: [toHappy] });
      machine.send({ type: 'SEGMENTS_LOADED', routeId: 1, segments: [loaded(toHappy, 3)] });

      expect(playbackStatusOf(machine.getSnapshot())).toBe('loading');
      expect(machine.getSnapshot().context.loaded).toEqual([]);
    });

    it('should not start playing with no segments', () => {
      machine.send({ type: 'ROUTE_PLANNED', routeId: 1, target: HAPPY, route: [toHappy] });
      machine.send({ type: 'SEGMENTS_LOADED', routeId: 1, segments: [] });

      expect(playbackStatusOf(machine.getSnapshot())).toBe('loading');
    });
  });

  describe('Playing', () => {
    it('should show the first frame once segments arrive', () => {
      machine.send({ type: 'ROUTE_PLANNED', routeId: 1, target: HAPPY, route: [toHappy] });
      machine.send({ type: 'SEGMENTS_LOADED', routeId: 1, segments: [loaded(toHappy, 3)] });

      const snapshot = machine.getSnapshot();
      expect(playbackStatusOf(snapshot)).toBe('playing');
      expect(currentFrame(snapshot.context)?.url).toBe('neutral_to_happy_soft__center/f0.png');
    });

    it('should advance one frame per tick and settle after the last frame', () => {
      machine.send({ type: 'ROUTE_PLANNED', routeId: 1, target: HAPPY, route: [toHappy] });
      machine.send({ type: 'SEGMENTS_LOADED', routeId: 1, segments: [loaded(toHappy, 3)] });

      machine.send({ type: 'FRAME_TICK' });
      expect(currentFrame(machine.getSnapshot().context)?.file).toBe('f1.png');
      machine.send({ type: 'FRAME_TICK' });
      expect(currentFrame(machine.getSnapshot().context)?.file).toBe('f2.png');
      expect(playbackStatusOf(machine.getSnapshot())).toBe('playing');

      machine.send({ type: 'FRAME_TICK' });
      const snapshot = machine.getSnapshot();
      expect(playbackStatusOf(snapshot)).toBe('idle');
      expect(snapshot.context.settled).toEqual(HAPPY);
      expect(snapshot.context.loaded).toEqual([]);
    });

    it('should move to the next segment after the last frame of the current one', () => {
      const back = segment('neutral_to_concerned__center', CONCERNED, NEUTRAL);
      const fwd = segment('neutral_to_happy_soft__center', NEUTRAL, HAPPY);
      machine.send({ type: 'ROUTE_PLANNED', routeId: 1, target: HAPPY, route: [back, fwd] });
      machine.send({ type: 'SEGMENTS_LOADED', routeId: 1, segments: [loaded(back, 2), loaded(fwd, 2)] });

      machine.send({ type: 'FRAME_TICK' });
      machine.send({ type: 'FRAME_TICK' });

      const { context } = machine.getSnapshot();
      expect(context.segmentIndex).toBe(1);
      expect(context.frameIndex).toBe(0);
      expect(currentFrame(context)?.url).toBe('neutral_to_happy_soft__center/f0.png');
    });
  });

  describe('Preemption', () => {
    it('should enter preempted when a new route replaces a playing one', () => {
      const toConcerned = segment('neutral_to_concerned__center', HAPPY, CONCERNED);
      machine.send({ type: 'ROUTE_PLANNED', routeId: 1, target: HAPPY, route: [toHappy] });
      machine.send({ type: 'SEGMENTS_LOADED', routeId: 1, segments: [loaded(toHappy, 3)] });
      machine.send({ type: 'ROUTE_PLANNED', routeId: 2, target: CONCERNED, route: [toConcerned] });

      expect(playbackStatusOf(machine.getSnapshot())).toBe('preempted');

      machine.send({ type: 'SEGMENTS_LOADED', routeId: 1, segments: [loaded(toHappy, 3)] });
      expect(playbackStatusOf(machine.getSnapshot())).toBe('preempted');

      machine.send({ type: 'SEGMENTS_LOADED', routeId: 2, segments: [loaded(toConcerned, 3)] });
      const snapshot = machine.getSnapshot();
      expect(playbackStatusOf(snapshot)).toBe('playing');
      expect(snapshot.context.target).toEqual(CONCERNED);
    });

    it('should enter preempted when a new route replaces a loading one', () => {
      machine.send({ type: 'ROUTE_PLANNED', routeId: 1, target: HAPPY, route: [toHappy] });
      machine.send({ type: 'ROUTE_PLANNED', routeId: 2, target: NEUTRAL, route: [] });

      expect(playbackStatusOf(machine.getSnapshot())).toBe('preempted');
      expect(machine.getSnapshot().context.routeId).toBe(2);
    });
  });

  describe('Jump cuts', () => {
    it('should settle at the target from any state', () => {
      machine.send({ type: 'ROUTE_PLANNED', routeId: 1, target: HAPPY, route: [toHappy] });
      machine.send({ type: 'JUMP_CUT', routeId: 2, target: CONCERNED });

      const snapshot = machine.getSnapshot();
      expect(playbackStatusOf(snapshot)).toBe('idle');
      expect(snapshot.context.settled).toEqual(CONCERNED);
      expect(snapshot.context.target).toEqual(CONCERNED);
      expect(snapshot.context.routeId).toBe(2);
    });

    it('should reset to a given state', () => {
      machine.send({ type: 'JUMP_CUT', routeId: 1, target: CONCERNED });
      machine.send({ type: 'RESET', routeId: 2, state: NEUTRAL });

      expect(machine.getSnapshot().context.settled).toEqual(NEUTRAL);
      expect(machine.getSnapshot().context.routeId).toBe(2);
    });
  });
});
