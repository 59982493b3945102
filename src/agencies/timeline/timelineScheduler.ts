/**
 * Timeline Scheduler
 * Runs the resolution tick: polls the clock, resolves the tracks and hands a
 * changed target to the rig. The last resolved state is the only memory kept
 * between ticks.
 */

import type { Actor } from 'xstate';
import type { RigState } from '../rig/types';
import { NEUTRAL_CENTER, stateKey } from '../rig/types';
import { errorMessage } from '../rig/errors';
import type { RigEventEmitter } from '../rig/rigEvents';
import { resolutionStep } from './compositor';
import type { TimelineMachine } from './timelineMachine';
import type { TimelineClock } from './transportClock';

/** Anything that accepts target states: normally the playback service. */
export interface RigTargetSink {
  requestTarget: (target: RigState) => Promise<void> | void;
}

export interface TimelineSchedulerConfig {
  resolutionIntervalMs: number;
}

export class TimelineScheduler {
  private machine: Actor<TimelineMachine>;
  private sink: RigTargetSink;
  private clock: TimelineClock;
  private events: RigEventEmitter;
  private config: TimelineSchedulerConfig;

  private timer: ReturnType<typeof setInterval> | null = null;
  private lastResolved: RigState | null = null;

  constructor(
    machine: Actor<TimelineMachine>,
    sink: RigTargetSink,
    clock: TimelineClock,
    events: RigEventEmitter,
    config: TimelineSchedulerConfig
  ) {
    this.machine = machine;
    this.sink = sink;
    this.clock = clock;
    this.events = events;
    this.config = config;
  }

  public startTicking() {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.config.resolutionIntervalMs);
    this.tick();
  }

  public stopTicking() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * One resolution pass at the clock's position.
   * Ends playback once the position reaches the timeline duration.
   */
  public tick() {
    const { tracks, durationMs } = this.machine.getSnapshot().context;
    const timeMs = this.clock.nowMs();

    if (durationMs !== null && timeMs >= durationMs && this.machine.getSnapshot().matches('playing')) {
      console.log(`[TimelineScheduler] Reached end at ${Math.round(timeMs)}ms`);
      this.finish();
      return;
    }

    const step = resolutionStep(tracks, timeMs, this.lastResolved);
    if (!step.changed) return;

    this.lastResolved = step.state;
    this.events.emitTargetResolved(timeMs, step.state);
    this.forward(step.state);
  }

  /** Resolve immediately at the current position, even if nothing changed. */
  public resync() {
    this.lastResolved = null;
    this.tick();
  }

  /** Hand `state` to the rig and remember it as resolved. */
  public reset(state: RigState = NEUTRAL_CENTER) {
    this.lastResolved = state;
    this.forward(state);
  }

  public get lastResolvedState(): RigState | null {
    return this.lastResolved;
  }

  public dispose() {
    this.stopTicking();
  }

  private finish() {
    this.stopTicking();
    this.clock.pause();
    this.clock.seek(0);
    this.machine.send({ type: 'STOP' });
  }

  private forward(state: RigState) {
    const report = (err: unknown) =>
      console.error(`[TimelineScheduler] Target ${stateKey(state)} failed:`, errorMessage(err));
    try {
      void Promise.resolve(this.sink.requestTarget(state)).catch(report);
    } catch (err) {
      report(err);
    }
  }
}
