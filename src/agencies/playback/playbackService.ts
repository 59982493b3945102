/**
 * Playback Service
 * Wires the playback machine and scheduler and exposes the rig's single entry
 * point, requestTarget, to every driver.
 */

import { createActor } from 'xstate';
import type { Actor } from 'xstate';
import type { RigState } from '../rig/types';
import { sameState } from '../rig/types';
import { rigEvents } from '../rig/rigEvents';
import type { PlaybackStatus, RigEventEmitter } from '../rig/rigEvents';
import type { TransitionGraph } from '../routing/transitionGraph';
import { DEFAULT_GRAPH } from '../routing/transitionGraph';
import { CachingSequenceStore } from '../sequences/sequenceStore';
import type { SequenceStore } from '../sequences/types';
import { resolveRigConfig } from '../../config/rigConfig';
import type { RigConfig } from '../../config/rigConfig';
import { playbackMachine, playbackStatusOf } from './playbackMachine';
import type { PlaybackMachine } from './playbackMachine';
import { PlaybackScheduler } from './playbackScheduler';
import type { PlaybackHostCaps } from './types';

export interface PlaybackSnapshotInfo {
  status: PlaybackStatus;
  settled: RigState;
  target: RigState;
  routeId: number;
  segmentIndex: number;
  frameIndex: number;
}

export interface PlaybackServiceAPI {
  /** Route to `target`; resolves once its sequences were applied or discarded */
  requestTarget: (target: RigState) => Promise<void>;
  jumpTo: (target: RigState) => void;
  reset: (state: RigState) => void;
  start: () => void;
  stop: () => void;
  getStatus: () => PlaybackStatus;
  getState: () => PlaybackSnapshotInfo;
  subscribe: (callback: (state: PlaybackSnapshotInfo) => void) => () => void;
  dispose: () => void;
  actor: Actor<PlaybackMachine>;
}

export interface PlaybackServiceDeps {
  store: SequenceStore;
  host: PlaybackHostCaps;
  config?: Pick<RigConfig, 'fps' | 'crossfadeMs'>;
  graph?: TransitionGraph;
  events?: RigEventEmitter;
  /** State shown before the first request (default neutral@center) */
  initialState?: RigState;
  /** Memoise fetched sequences (default true) */
  cache?: boolean;
  /** Start the frame timer immediately (default true) */
  autoStart?: boolean;
}

export function createPlaybackService(deps: PlaybackServiceDeps): PlaybackServiceAPI {
  const { fps, crossfadeMs } = deps.config ?? resolveRigConfig();
  const events = deps.events ?? rigEvents;
  const store =
    deps.cache === false || deps.store instanceof CachingSequenceStore
      ? deps.store
      : new CachingSequenceStore(deps.store);

  const machine = createActor(playbackMachine).start();

  const scheduler = new PlaybackScheduler(
    machine,
    deps.host,
    { fps, crossfadeMs },
    { store, graph: deps.graph ?? DEFAULT_GRAPH, events }
  );

  if (deps.initialState && !sameState(deps.initialState, machine.getSnapshot().context.settled)) {
    scheduler.reset(deps.initialState);
  }

  const info = (): PlaybackSnapshotInfo => {
    const snapshot = machine.getSnapshot();
    const { settled, target, routeId, segmentIndex, frameIndex } = snapshot.context;
    return { status: playbackStatusOf(snapshot), settled, target, routeId, segmentIndex, frameIndex };
  };

  const subscribers = new Set<(state: PlaybackSnapshotInfo) => void>();

  const subscription = machine.subscribe((snapshot) => {
    scheduler.onSnapshot(snapshot);
    const current = info();
    subscribers.forEach((callback) => callback(current));
  });

  if (deps.autoStart !== false) scheduler.start();

  return {
    requestTarget(target: RigState): Promise<void> {
      return scheduler.requestTarget(target);
    },

    jumpTo(target: RigState): void {
      scheduler.jumpTo(target);
    },

    reset(state: RigState): void {
      scheduler.reset(state);
    },

    start(): void {
      scheduler.start();
    },

    stop(): void {
      scheduler.stop();
    },

    getStatus(): PlaybackStatus {
      return playbackStatusOf(machine.getSnapshot());
    },

    getState: info,

    subscribe(callback: (state: PlaybackSnapshotInfo) => void): () => void {
      subscribers.add(callback);
      return () => {
        subscribers.delete(callback);
      };
    },

    dispose(): void {
      scheduler.dispose();
      subscription.unsubscribe();
      subscribers.clear();
      machine.stop();
    },

    actor: machine,
  };
}
