/**
 * Two-buffer crossfade presenter.
 * Each new frame goes into the hidden buffer, which then fades in over the
 * visible one. The very first frame cuts in with no fade.
 */

import type { BufferId, RigEventEmitter } from '../rig/rigEvents';
import type { PlaybackHostCaps } from './types';

export class CrossfadeBuffers {
  private host: PlaybackHostCaps;
  private fadeMs: number;
  private events: RigEventEmitter;
  private visible: BufferId | null = null;
  private shownUrl: string | null = null;

  constructor(host: PlaybackHostCaps, fadeMs: number, events: RigEventEmitter) {
    this.host = host;
    this.fadeMs = fadeMs;
    this.events = events;
  }

  /** Returns false when `url` is already on screen. */
  present(url: string): boolean {
    if (url === this.shownUrl) return false;

    const hidden: BufferId = this.visible === 'A' ? 'B' : 'A';
    const fade = this.visible === null ? 0 : this.fadeMs;

    this.host.writeBuffer(hidden, url);
    this.host.showBuffer(hidden, fade);
    this.visible = hidden;
    this.shownUrl = url;
    this.events.emitFramePresented(url, hidden);
    return true;
  }

  get visibleBuffer(): BufferId | null {
    return this.visible;
  }

  get currentUrl(): string | null {
    return this.shownUrl;
  }
}
