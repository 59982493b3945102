/**
 * Sequence Store clients
 *
 * HttpSequenceStore talks to the asset backend:
 *   GET {base}/timeline/{pathId}   -> manifest JSON
 *   GET {base}/timelines           -> string[] of known path ids
 *   frames at {base}/frames/{pathId}/{file}
 *
 * CachingSequenceStore memoises fetches. Sequences never change once served,
 * so a successful fetch is kept for the lifetime of the store; a failed one is
 * evicted so the next request tries again.
 */

import { isExpressionId, isPoseId } from '../rig/types';
import { SequenceFetchError, errorMessage } from '../rig/errors';
import type { FetchLike, SequenceFrame, SequenceManifest, SequenceStore } from './types';

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

/** A still pose (`center`) or a pose transition (`center_to_tilt_left_small`). */
export function isManifestPose(value: unknown): value is string {
  if (isPoseId(value)) return true;
  if (typeof value !== 'string') return false;
  const parts = value.split('_to_');
  return parts.length === 2 && isPoseId(parts[0]) && isPoseId(parts[1]);
}

/**
 * Validate raw JSON into a manifest.
 * Frames must ascend strictly by t within [0, 1] and include both endpoints.
 */
export function parseSequenceManifest(raw: unknown, expectedPathId?: string): SequenceManifest {
  const label = expectedPathId ?? 'manifest';
  const fail = (msg: string): never => {
    throw new SequenceFetchError(label, msg);
  };

  if (!isRecord(raw)) return fail('manifest is not an object');

  const { path_id, expr_start, expr_end, pose, frames } = raw;
  if (typeof path_id !== 'string' || path_id === '') return fail('missing path_id');
  if (expectedPathId !== undefined && path_id !== expectedPathId) {
    return fail(`path_id mismatch (got ${path_id})`);
  }
  if (!isExpressionId(expr_start)) return fail(`unknown expr_start ${String(expr_start)}`);
  if (!isExpressionId(expr_end)) return fail(`unknown expr_end ${String(expr_end)}`);
  if (!isManifestPose(pose)) return fail(`unknown pose ${String(pose)}`);
  if (!Array.isArray(frames) || frames.length === 0) return fail('no frames');

  const parsed: SequenceFrame[] = [];
  for (const [i, f] of frames.entries()) {
    if (!isRecord(f)) return fail(`frame ${i} is not an object`);
    const { t, file } = f;
    if (typeof t !== 'number' || !Number.isFinite(t) || t < 0 || t > 1) {
      return fail(`frame ${i} has invalid t`);
    }
    if (typeof file !== 'string' || file === '') return fail(`frame ${i} has no file`);
    const prev = parsed[parsed.length - 1];
    if (prev && t <= prev.t) return fail(`frames not ascending at index ${i}`);
    parsed.push({ t, file });
  }

  if (parsed[0].t !== 0) return fail('first frame is not t=0');
  if (parsed[parsed.length - 1].t !== 1) return fail('last frame is not t=1');

  return { path_id, expr_start, expr_end, pose, frames: parsed };
}

export interface HttpSequenceStoreOptions {
  baseUrl: string;
  fetchImpl?: FetchLike;
}

export class HttpSequenceStore implements SequenceStore {
  private baseUrl: string;
  private fetchImpl: FetchLike;

  constructor(options: HttpSequenceStoreOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchSequence(pathId: string): Promise<SequenceManifest> {
    const url = `${this.baseUrl}/timeline/${encodeURIComponent(pathId)}`;
    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (err) {
      throw new SequenceFetchError(pathId, errorMessage(err), { cause: err });
    }
    if (!response.ok) {
      throw new SequenceFetchError(pathId, `HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new SequenceFetchError(pathId, 'response is not JSON', { cause: err });
    }
    return parseSequenceManifest(body, pathId);
  }

  frameUrl(pathId: string, file: string): string {
    return `${this.baseUrl}/frames/${encodeURIComponent(pathId)}/${encodeURIComponent(file)}`;
  }

  /** Known sequence ids; an unavailable listing yields []. */
  async listSequences(): Promise<string[]> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/timelines`);
      if (!response.ok) {
        console.warn(`[HttpSequenceStore] Listing failed: HTTP ${response.status}`);
        return [];
      }
      const body: unknown = await response.json();
      if (!Array.isArray(body)) return [];
      return body.filter((id): id is string => typeof id === 'string');
    } catch (err) {
      console.warn('[HttpSequenceStore] Listing failed:', errorMessage(err));
      return [];
    }
  }
}

export class CachingSequenceStore implements SequenceStore {
  private inner: SequenceStore;
  private cache = new Map<string, Promise<SequenceManifest>>();

  constructor(inner: SequenceStore) {
    this.inner = inner;
  }

  fetchSequence(pathId: string): Promise<SequenceManifest> {
    const cached = this.cache.get(pathId);
    if (cached) return cached;

    const pending = this.inner.fetchSequence(pathId);
    this.cache.set(pathId, pending);
    // Eviction only; the caller still receives the rejection
    void pending.catch(() => {
      if (this.cache.get(pathId) === pending) this.cache.delete(pathId);
    });
    return pending;
  }

  frameUrl(pathId: string, file: string): string {
    return this.inner.frameUrl(pathId, file);
  }

  has(pathId: string): boolean {
    return this.cache.has(pathId);
  }

  clear() {
    this.cache.clear();
  }
}
