/**
 * Transport clock: the authoritative playback position for the resolution tick.
 * An audio element adapter can stand in for it by implementing TimelineClock.
 */

export interface TimelineClock {
  /** Current playback position in ms */
  nowMs(): number;
  start(): void;
  pause(): void;
  seek(positionMs: number): void;
}

export class TransportClock implements TimelineClock {
  private now: () => number;
  private running = false;
  /** Wall time the position was last anchored at */
  private anchorMs = 0;
  /** Position at the anchor */
  private positionMs = 0;

  constructor(now: () => number = () => performance.now()) {
    this.now = now;
  }

  nowMs(): number {
    return this.running ? this.positionMs + (this.now() - this.anchorMs) : this.positionMs;
  }

  start() {
    if (this.running) return;
    this.anchorMs = this.now();
    this.running = true;
  }

  pause() {
    if (!this.running) return;
    this.positionMs = this.nowMs();
    this.running = false;
  }

  seek(positionMs: number) {
    this.positionMs = Math.max(0, positionMs);
    this.anchorMs = this.now();
  }

  get isRunning(): boolean {
    return this.running;
  }
}
