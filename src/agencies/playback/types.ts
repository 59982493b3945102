/**
 * Playback Agency Types
 */

import type { RigState, Route, Segment } from '../rig/types';
import type { BufferId } from '../rig/rigEvents';

/** A frame resolved to an image URL, in play order. */
export interface PlayableFrame {
  t: number;
  file: string;
  url: string;
}

/** A route segment whose sequence has been fetched; backward segments hold frames in descending t. */
export interface LoadedSegment {
  segment: Segment;
  frames: PlayableFrame[];
}

export interface PlaybackContext {
  /** State whose idle frame shows while nothing plays */
  settled: RigState;
  /** Most recently requested target; new routes are planned from here */
  target: RigState;
  /** Identity of the current route; results tagged with an older id are stale */
  routeId: number;
  route: Route;
  loaded: LoadedSegment[];
  segmentIndex: number;
  frameIndex: number;
}

export type PlaybackEvent =
  | { type: 'ROUTE_PLANNED'; routeId: number; target: RigState; route: Route }
  | { type: 'SEGMENTS_LOADED'; routeId: number; segments: LoadedSegment[] }
  | { type: 'FRAME_TICK' }
  | { type: 'JUMP_CUT'; routeId: number; target: RigState }
  | { type: 'RESET'; routeId: number; state: RigState };

/** What the host surface must provide: two stacked image buffers. */
export interface PlaybackHostCaps {
  /** Load `url` into `buffer` while it is hidden */
  writeBuffer: (buffer: BufferId, url: string) => void;
  /** Make `buffer` the visible one, fading over `fadeMs` (0 = cut) */
  showBuffer: (buffer: BufferId, fadeMs: number) => void;
}

export interface PlaybackConfig {
  fps: number;
  crossfadeMs: number;
}
