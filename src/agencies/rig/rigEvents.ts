/**
 * Rig Event Types and Emitter for RxJS Observable Streams
 *
 * Events are emitted at meaningful moments (route planned, route finished,
 * fetch failed, frame presented) rather than on every tick.
 */

import { Subject, Observable } from 'rxjs';
import { filter, map, distinctUntilChanged, shareReplay } from 'rxjs/operators';
import type { RigState, Route } from './types';

export type PlaybackStatus = 'idle' | 'loading' | 'playing' | 'preempted';
export type BufferId = 'A' | 'B';

// ============ Core Event Types ============

interface RigEventBase {
  timestamp: number;
}

export interface RoutePlannedEvent extends RigEventBase {
  type: 'ROUTE_PLANNED';
  routeId: number;
  from: RigState;
  to: RigState;
  route: Route;
}

/**
 * Non-fatal: the rig jump-cuts to `to`.
 * `all-segments-dropped` means a route existed but no sequence could be fetched.
 */
export interface RouteNotFoundEvent extends RigEventBase {
  type: 'ROUTE_NOT_FOUND';
  from: RigState;
  to: RigState;
  reason: 'no-path' | 'all-segments-dropped';
}

export interface SequenceFetchFailedEvent extends RigEventBase {
  type: 'SEQUENCE_FETCH_FAILED';
  pathId: string;
  message: string;
}

export interface RouteCompletedEvent extends RigEventBase {
  type: 'ROUTE_COMPLETED';
  routeId: number;
  state: RigState;
}

export interface FramePresentedEvent extends RigEventBase {
  type: 'FRAME_PRESENTED';
  url: string;
  buffer: BufferId;
}

export interface StatusChangedEvent extends RigEventBase {
  type: 'STATUS_CHANGED';
  status: PlaybackStatus;
}

/** Emitted by the timeline resolution tick whenever the effective state changes. */
export interface TargetResolvedEvent extends RigEventBase {
  type: 'TARGET_RESOLVED';
  timeMs: number;
  state: RigState;
}

export type RigEvent =
  | RoutePlannedEvent
  | RouteNotFoundEvent
  | SequenceFetchFailedEvent
  | RouteCompletedEvent
  | FramePresentedEvent
  | StatusChangedEvent
  | TargetResolvedEvent;

// ============ Emitter ============

export class RigEventEmitter {
  private event$ = new Subject<RigEvent>();

  /** Observable stream of discrete rig events */
  get events(): Observable<RigEvent> {
    return this.event$.asObservable();
  }

  private now(): number {
    return typeof performance !== 'undefined' ? performance.now() : Date.now();
  }

  emitRoutePlanned(data: { routeId: number; from: RigState; to: RigState; route: Route }) {
    this.event$.next({ type: 'ROUTE_PLANNED', ...data, timestamp: this.now() });
  }

  emitRouteNotFound(from: RigState, to: RigState, reason: RouteNotFoundEvent['reason']) {
    this.event$.next({ type: 'ROUTE_NOT_FOUND', from, to, reason, timestamp: this.now() });
  }

  emitSequenceFetchFailed(pathId: string, message: string) {
    this.event$.next({ type: 'SEQUENCE_FETCH_FAILED', pathId, message, timestamp: this.now() });
  }

  emitRouteCompleted(routeId: number, state: RigState) {
    this.event$.next({ type: 'ROUTE_COMPLETED', routeId, state, timestamp: this.now() });
  }

  emitFramePresented(url: string, buffer: BufferId) {
    this.event$.next({ type: 'FRAME_PRESENTED', url, buffer, timestamp: this.now() });
  }

  emitStatusChanged(status: PlaybackStatus) {
    this.event$.next({ type: 'STATUS_CHANGED', status, timestamp: this.now() });
  }

  emitTargetResolved(timeMs: number, state: RigState) {
    this.event$.next({ type: 'TARGET_RESOLVED', timeMs, state, timestamp: this.now() });
  }

  complete() {
    this.event$.complete();
  }
}

// Shared instance for hosts that wire a single rig
export const rigEvents = new RigEventEmitter();

// ============================================================================
// Derived Observables
// ============================================================================

/** Routing failures, whether no path existed or every segment failed to load. */
export function routeFailures$(emitter: RigEventEmitter = rigEvents): Observable<RouteNotFoundEvent> {
  return emitter.events.pipe(
    filter((e): e is RouteNotFoundEvent => e.type === 'ROUTE_NOT_FOUND')
  );
}

export function playbackStatus$(emitter: RigEventEmitter = rigEvents): Observable<PlaybackStatus> {
  return emitter.events.pipe(
    filter((e): e is StatusChangedEvent => e.type === 'STATUS_CHANGED'),
    map(e => e.status),
    distinctUntilChanged(),
    shareReplay(1)
  );
}

/** URLs of presented frames, in presentation order. */
export function presentedFrames$(emitter: RigEventEmitter = rigEvents): Observable<string> {
  return emitter.events.pipe(
    filter((e): e is FramePresentedEvent => e.type === 'FRAME_PRESENTED'),
    map(e => e.url)
  );
}
