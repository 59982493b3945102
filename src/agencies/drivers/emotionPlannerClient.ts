/**
 * Emotion planner client
 * Sends the transcript and phoneme track to the planner backend and turns its
 * answer into expression keyframes for the timeline.
 */

import { isExpressionId } from '../rig/types';
import { MalformedTrackDataError, PlannerRequestError, errorMessage } from '../rig/errors';
import type { FetchLike } from '../sequences/types';
import type { ExpressionKeyframe, PhonemeKeyframe } from '../timeline/types';
import { validateExpressionTrack } from '../timeline/trackValidation';

export interface EmotionPlannerOptions {
  baseUrl: string;
  fetchImpl?: FetchLike;
  /** Transition given to every planned keyframe */
  transitionMs?: number;
}

export interface PlannerPhonemeEntry {
  time_ms: number;
  phoneme: string;
  target_expr: string;
  transition_duration_ms: number;
}

export interface EmotionPlanRequest {
  transcript: string;
  phoneme_timeline: PlannerPhonemeEntry[];
  total_duration_ms: number;
}

export const EMOTION_TRANSITION_MS = 300;
/** Used when the phoneme track gives no better estimate */
export const FALLBACK_DURATION_MS = 3000;

const SOURCE = 'emotion planner response';

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

export function buildEmotionPlanRequest(
  transcript: string,
  phonemeTrack: readonly PhonemeKeyframe[],
  totalDurationMs?: number
): EmotionPlanRequest {
  const last = phonemeTrack[phonemeTrack.length - 1];
  return {
    transcript,
    phoneme_timeline: phonemeTrack.map(kf => ({
      time_ms: kf.timeMs,
      phoneme: kf.phoneme,
      target_expr: kf.targetExpr,
      transition_duration_ms: kf.transitionDurationMs,
    })),
    total_duration_ms: totalDurationMs ?? (last && last.timeMs > 0 ? last.timeMs : FALLBACK_DURATION_MS),
  };
}

/** `{ keyframes: [{ time_ms, target_expr }] }` to time-ordered expression keyframes. */
export function parseEmotionKeyframes(
  raw: unknown,
  transitionMs = EMOTION_TRANSITION_MS,
  idPrefix = 'emotion'
): ExpressionKeyframe[] {
  if (!isRecord(raw) || !Array.isArray(raw.keyframes)) {
    throw new MalformedTrackDataError(SOURCE, ['keyframes is not an array']);
  }

  const issues: string[] = [];
  const keyframes: ExpressionKeyframe[] = [];
  raw.keyframes.forEach((entry: unknown, i) => {
    if (!isRecord(entry)) {
      issues.push(`keyframes[${i}] is not an object`);
      return;
    }
    const { time_ms, target_expr } = entry;
    if (typeof time_ms !== 'number' || !Number.isFinite(time_ms) || time_ms < 0) {
      issues.push(`keyframes[${i}].time_ms invalid`);
      return;
    }
    if (!isExpressionId(target_expr)) {
      issues.push(`keyframes[${i}].target_expr unknown: ${String(target_expr)}`);
      return;
    }
    keyframes.push({ id: `${idPrefix}_${i}`, timeMs: time_ms, targetExpr: target_expr, transitionDurationMs: transitionMs });
  });

  if (issues.length > 0) throw new MalformedTrackDataError(SOURCE, issues);
  return validateExpressionTrack(keyframes, SOURCE);
}

export class EmotionPlannerClient {
  private baseUrl: string;
  private fetchImpl: FetchLike;
  private transitionMs: number;
  /** Numbers each plan so its keyframe ids never repeat an earlier plan's */
  private planCount = 0;

  constructor(options: EmotionPlannerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.transitionMs = options.transitionMs ?? EMOTION_TRANSITION_MS;
  }

  async plan(
    transcript: string,
    phonemeTrack: readonly PhonemeKeyframe[],
    totalDurationMs?: number
  ): Promise<ExpressionKeyframe[]> {
    const request = buildEmotionPlanRequest(transcript, phonemeTrack, totalDurationMs);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/generate-emotions`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
      });
    } catch (err) {
      throw new PlannerRequestError(errorMessage(err), null, { cause: err });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new PlannerRequestError(detail ? `HTTP ${response.status} ${detail}` : `HTTP ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new PlannerRequestError('response is not JSON', response.status, { cause: err });
    }

    const keyframes = parseEmotionKeyframes(body, this.transitionMs, `emotion_${++this.planCount}`);
    console.log(`[EmotionPlanner] Planned ${keyframes.length} expression keyframes`);
    return keyframes;
  }
}
