/**
 * Playback Scheduler
 * Owns the frame timer, sequence fetches and presentation for the playback machine.
 *
 * - requestTarget plans from the previously requested target, not the frame on screen
 * - all sequences of a route are fetched together; failed ones are dropped
 * - fetch results for a superseded route are discarded
 * - while loading, the last presented frame stays up
 */

import type { Actor, SnapshotFrom } from 'xstate';
import type { RigState, Route, Segment } from '../rig/types';
import { sameState, stateKey } from '../rig/types';
import { errorMessage } from '../rig/errors';
import type { PlaybackStatus, RigEventEmitter } from '../rig/rigEvents';
import type { TransitionGraph } from '../routing/transitionGraph';
import { planRouteResult } from '../routing/transitionGraph';
import { idleFrameSource } from '../routing/idleFrames';
import type { SequenceManifest, SequenceStore } from '../sequences/types';
import type { PlaybackMachine } from './playbackMachine';
import { currentFrame, isRouteExhausted, playbackStatusOf } from './playbackMachine';
import { CrossfadeBuffers } from './crossfade';
import type { LoadedSegment, PlaybackConfig, PlaybackHostCaps } from './types';

export interface PlaybackSchedulerDeps {
  store: SequenceStore;
  graph: TransitionGraph;
  events: RigEventEmitter;
}

export class PlaybackScheduler {
  private machine: Actor<PlaybackMachine>;
  private deps: PlaybackSchedulerDeps;
  private config: PlaybackConfig;
  private buffers: CrossfadeBuffers;

  private routeCounter = 0;
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private idleRequest = 0;
  private lastStatus: PlaybackStatus = 'idle';
  private idleShownFor: string | null = null;
  private disposed = false;

  constructor(
    machine: Actor<PlaybackMachine>,
    host: PlaybackHostCaps,
    config: PlaybackConfig,
    deps: PlaybackSchedulerDeps
  ) {
    this.machine = machine;
    this.config = config;
    this.deps = deps;
    this.buffers = new CrossfadeBuffers(host, config.crossfadeMs, deps.events);
    this.routeCounter = machine.getSnapshot().context.routeId;
  }

  /**
   * Plan and start a route to `target`.
   * Resolves once the route's sequences were applied or discarded; never rejects.
   */
  public requestTarget(target: RigState): Promise<void> {
    if (this.disposed) return Promise.resolve();

    const from = this.machine.getSnapshot().context.target;
    if (sameState(from, target)) return Promise.resolve();

    const { route, error } = planRouteResult(from, target, this.deps.graph);
    const routeId = ++this.routeCounter;

    if (error) {
      console.warn(`[PlaybackScheduler] ${error.message}; jump-cutting`);
      this.deps.events.emitRouteNotFound(from, target, 'no-path');
      this.machine.send({ type: 'JUMP_CUT', routeId, target });
      return Promise.resolve();
    }

    this.deps.events.emitRoutePlanned({ routeId, from, to: target, route });
    this.machine.send({ type: 'ROUTE_PLANNED', routeId, target, route });
    return this.loadRoute(routeId, from, target, route);
  }

  /** Show `target` immediately, abandoning any route in flight. */
  public jumpTo(target: RigState) {
    if (this.disposed) return;
    const routeId = ++this.routeCounter;
    this.machine.send({ type: 'JUMP_CUT', routeId, target });
  }

  /** Abandon everything and settle at `state`. */
  public reset(state: RigState) {
    if (this.disposed) return;
    const routeId = ++this.routeCounter;
    this.machine.send({ type: 'RESET', routeId, state });
  }

  public start() {
    if (this.disposed || this.tickTimer) return;
    const intervalMs = 1000 / this.config.fps;
    this.tickTimer = setInterval(() => this.tick(), intervalMs);
    console.log(`[PlaybackScheduler] Started at ${this.config.fps} fps`);
    this.onSnapshot(this.machine.getSnapshot());
  }

  public stop() {
    if (!this.tickTimer) return;
    clearInterval(this.tickTimer);
    this.tickTimer = null;
    this.idleShownFor = null;
    console.log('[PlaybackScheduler] Stopped');
  }

  public get isRunning(): boolean {
    return this.tickTimer !== null;
  }

  public get currentUrl(): string | null {
    return this.buffers.currentUrl;
  }

  /** Called by the service for every machine snapshot. */
  public onSnapshot(snapshot: SnapshotFrom<PlaybackMachine>) {
    if (this.disposed) return;

    const status = playbackStatusOf(snapshot);
    if (status !== this.lastStatus) {
      this.lastStatus = status;
      this.deps.events.emitStatusChanged(status);
    }

    if (status === 'playing') {
      this.idleShownFor = null;
      const frame = currentFrame(snapshot.context);
      if (frame && this.tickTimer) this.buffers.present(frame.url);
      return;
    }

    if (status === 'idle' && this.tickTimer) {
      const key = stateKey(snapshot.context.settled);
      if (key !== this.idleShownFor) {
        this.idleShownFor = key;
        void this.showIdleFrame(snapshot.context.settled);
      }
      return;
    }

    this.idleShownFor = null;
  }

  public dispose() {
    this.stop();
    this.disposed = true;
  }

  // ---------- internals ----------

  private tick() {
    const snapshot = this.machine.getSnapshot();
    if (!snapshot.matches('playing')) return;

    const finishing = isRouteExhausted(snapshot.context);
    const { routeId, target } = snapshot.context;
    this.machine.send({ type: 'FRAME_TICK' });

    if (finishing) {
      console.log(`[PlaybackScheduler] Route ${routeId} completed at ${stateKey(target)}`);
      this.deps.events.emitRouteCompleted(routeId, target);
    }
  }

  private isCurrent(routeId: number): boolean {
    return !this.disposed && this.machine.getSnapshot().context.routeId === routeId;
  }

  private async loadRoute(routeId: number, from: RigState, target: RigState, route: Route): Promise<void> {
    const results = await Promise.allSettled(route.map(seg => this.deps.store.fetchSequence(seg.pathId)));

    if (!this.isCurrent(routeId)) {
      console.log(`[PlaybackScheduler] Discarding sequences of superseded route ${routeId}`);
      return;
    }

    const loaded: LoadedSegment[] = [];
    results.forEach((result, i) => {
      const segment = route[i];
      if (result.status === 'fulfilled') {
        loaded.push(this.toLoadedSegment(segment, result.value));
        return;
      }
      const message = errorMessage(result.reason);
      console.warn(`[PlaybackScheduler] Dropping segment ${segment.pathId}: ${message}`);
      this.deps.events.emitSequenceFetchFailed(segment.pathId, message);
    });

    if (loaded.length === 0) {
      console.warn(`[PlaybackScheduler] Every segment of route ${routeId} failed; jump-cutting`);
      this.deps.events.emitRouteNotFound(from, target, 'all-segments-dropped');
      this.machine.send({ type: 'JUMP_CUT', routeId, target });
      return;
    }

    this.machine.send({ type: 'SEGMENTS_LOADED', routeId, segments: loaded });
  }

  private toLoadedSegment(segment: Segment, manifest: SequenceManifest): LoadedSegment {
    const ordered = segment.direction === 'forward' ? manifest.frames : [...manifest.frames].reverse();
    return {
      segment,
      frames: ordered.map(f => ({ ...f, url: this.deps.store.frameUrl(segment.pathId, f.file) })),
    };
  }

  private async showIdleFrame(state: RigState): Promise<void> {
    const request = ++this.idleRequest;
    const source = idleFrameSource(state, this.deps.graph);
    if (!source) {
      console.warn(`[PlaybackScheduler] No idle frame for ${stateKey(state)}`);
      return;
    }

    let manifest: SequenceManifest;
    try {
      manifest = await this.deps.store.fetchSequence(source.pathId);
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`[PlaybackScheduler] Idle frame unavailable for ${stateKey(state)}: ${message}`);
      this.deps.events.emitSequenceFetchFailed(source.pathId, message);
      return;
    }

    // Superseded by another idle request, a new route, or disposal
    if (request !== this.idleRequest || this.disposed) return;
    const snapshot = this.machine.getSnapshot();
    if (!snapshot.matches('idle') || !sameState(snapshot.context.settled, state)) return;

    const frames = manifest.frames;
    const frame = source.pick === 'first' ? frames[0] : frames[frames.length - 1];
    this.buffers.present(this.deps.store.frameUrl(source.pathId, frame.file));
  }
}
