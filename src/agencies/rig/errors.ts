import type { RigState } from './types';
import { stateKey } from './types';

export type RigErrorCode =
  | 'ROUTE_NOT_FOUND'
  | 'SEQUENCE_FETCH_FAILURE'
  | 'MALFORMED_TRACK_DATA'
  | 'PLANNER_REQUEST_FAILURE';

/**
 * Base class for failures surfaced by the rig core.
 * None of these should reach the user as a crash: routing and fetch failures
 * degrade to a jump-cut, malformed driver data is rejected at ingestion.
 */
export class RigError extends Error {
  readonly code: RigErrorCode;

  constructor(code: RigErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RigError';
    this.code = code;
  }
}

/** No sequence path connects the two states. */
export class RouteNotFoundError extends RigError {
  readonly from: RigState;
  readonly to: RigState;

  constructor(from: RigState, to: RigState) {
    super('ROUTE_NOT_FOUND', `No route from ${stateKey(from)} to ${stateKey(to)}`);
    this.name = 'RouteNotFoundError';
    this.from = from;
    this.to = to;
  }
}

/** The sequence store could not deliver a usable manifest for `pathId`. */
export class SequenceFetchError extends RigError {
  readonly pathId: string;

  constructor(pathId: string, message: string, options?: { cause?: unknown }) {
    super('SEQUENCE_FETCH_FAILURE', `Failed to load sequence ${pathId}: ${message}`, options);
    this.name = 'SequenceFetchError';
    this.pathId = pathId;
  }
}

/** Keyframe or phoneme data from an external driver failed validation. */
export class MalformedTrackDataError extends RigError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super('MALFORMED_TRACK_DATA', `Malformed ${source}: ${issues.join('; ')}`);
    this.name = 'MalformedTrackDataError';
    this.issues = issues;
  }
}

/** The emotion planner backend did not answer with a usable response. */
export class PlannerRequestError extends RigError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('PLANNER_REQUEST_FAILURE', `Emotion planner request failed: ${message}`, options);
    this.name = 'PlannerRequestError';
    this.status = status;
  }
}

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));
