/**
 * Playback State Machine
 *
 * idle      -> a settled state's idle frame is showing
 * loading   -> a route was planned, its sequences are being fetched
 * playing   -> frames of the loaded segments advance on FRAME_TICK
 * preempted -> a newer route replaced one that was loading or playing
 *
 * SEGMENTS_LOADED is only accepted for the current routeId.
 */

import { setup, assign } from 'xstate';
import type { SnapshotFrom } from 'xstate';
import type { PlaybackContext, PlaybackEvent, PlayableFrame } from './types';
import type { PlaybackStatus } from '../rig/rigEvents';
import { NEUTRAL_CENTER } from '../rig/types';

export function currentFrame(context: PlaybackContext): PlayableFrame | null {
  const seg = context.loaded[context.segmentIndex];
  if (!seg) return null;
  return seg.frames[context.frameIndex] ?? null;
}

export function isRouteExhausted(context: PlaybackContext): boolean {
  const lastSeg = context.loaded.length - 1;
  if (lastSeg < 0) return true;
  if (context.segmentIndex < lastSeg) return false;
  return context.frameIndex >= context.loaded[lastSeg].frames.length - 1;
}

export const playbackMachine = setup({
  types: {
    context: {} as PlaybackContext,
    events: {} as PlaybackEvent,
  },
  guards: {
    isFresh: ({ context, event }) =>
      event.type === 'SEGMENTS_LOADED' && event.routeId === context.routeId && event.segments.length > 0,
    routeExhausted: ({ context }) => isRouteExhausted(context),
  },
  actions: {
    startRoute: assign(({ event }) => {
      if (event.type !== 'ROUTE_PLANNED') return {};
      return {
        routeId: event.routeId,
        target: event.target,
        route: event.route,
        loaded: [],
        segmentIndex: 0,
        frameIndex: 0,
      };
    }),

    acceptSegments: assign(({ event }) => {
      if (event.type !== 'SEGMENTS_LOADED') return {};
      return { loaded: event.segments, segmentIndex: 0, frameIndex: 0 };
    }),

    advanceFrame: assign(({ context }) => {
      const seg = context.loaded[context.segmentIndex];
      if (seg && context.frameIndex < seg.frames.length - 1) {
        return { frameIndex: context.frameIndex + 1 };
      }
      return { segmentIndex: context.segmentIndex + 1, frameIndex: 0 };
    }),

    settleAtTarget: assign(({ context }) => ({
      settled: context.target,
      route: [],
      loaded: [],
      segmentIndex: 0,
      frameIndex: 0,
    })),

    jumpCut: assign(({ event }) => {
      if (event.type !== 'JUMP_CUT') return {};
      return {
        routeId: event.routeId,
        settled: event.target,
        target: event.target,
        route: [],
        loaded: [],
        segmentIndex: 0,
        frameIndex: 0,
      };
    }),

    reset: assign(({ event }) => {
      if (event.type !== 'RESET') return {};
      return {
        routeId: event.routeId,
        settled: event.state,
        target: event.state,
        route: [],
        loaded: [],
        segmentIndex: 0,
        frameIndex: 0,
      };
    }),
  },
}).createMachine({
  id: 'playback',
  initial: 'idle',
  context: {
    settled: NEUTRAL_CENTER,
    target: NEUTRAL_CENTER,
    routeId: 0,
    route: [],
    loaded: [],
    segmentIndex: 0,
    frameIndex: 0,
  },
  on: {
    JUMP_CUT: { target: '.idle', actions: 'jumpCut' },
    RESET: { target: '.idle', actions: 'reset' },
  },
  states: {
    idle: {
      on: {
        ROUTE_PLANNED: { target: 'loading', actions: 'startRoute' },
      },
    },
    loading: {
      on: {
        ROUTE_PLANNED: { target: 'preempted', actions: 'startRoute' },
        SEGMENTS_LOADED: { target: 'playing', guard: 'isFresh', actions: 'acceptSegments' },
      },
    },
    playing: {
      on: {
        ROUTE_PLANNED: { target: 'preempted', actions: 'startRoute' },
        FRAME_TICK: [
          { target: 'idle', guard: 'routeExhausted', actions: 'settleAtTarget' },
          { actions: 'advanceFrame' },
        ],
      },
    },
    preempted: {
      on: {
        ROUTE_PLANNED: { target: 'preempted', reenter: true, actions: 'startRoute' },
        SEGMENTS_LOADED: { target: 'playing', guard: 'isFresh', actions: 'acceptSegments' },
      },
    },
  },
});

export type PlaybackMachine = typeof playbackMachine;

export function playbackStatusOf(snapshot: SnapshotFrom<PlaybackMachine>): PlaybackStatus {
  if (snapshot.matches('loading')) return 'loading';
  if (snapshot.matches('playing')) return 'playing';
  if (snapshot.matches('preempted')) return 'preempted';
  return 'idle';
}
