/**
 * In-process sequence store holding registered manifests.
 * Used for offline rigs and tests.
 */

import { SequenceFetchError } from '../rig/errors';
import { parseSequenceManifest } from './sequenceStore';
import type { SequenceManifest, SequenceStore } from './types';

export class MemorySequenceStore implements SequenceStore {
  private manifests = new Map<string, SequenceManifest>();
  private frameBase: string;

  constructor(manifests: Iterable<SequenceManifest> = [], frameBase = 'mem://frames') {
    this.frameBase = frameBase;
    for (const m of manifests) this.register(m);
  }

  /** Validates and stores a manifest under its path_id. */
  register(manifest: unknown): SequenceManifest {
    const parsed = parseSequenceManifest(manifest);
    this.manifests.set(parsed.path_id, parsed);
    return parsed;
  }

  remove(pathId: string) {
    this.manifests.delete(pathId);
  }

  ids(): string[] {
    return [...this.manifests.keys()];
  }

  async fetchSequence(pathId: string): Promise<SequenceManifest> {
    const manifest = this.manifests.get(pathId);
    if (!manifest) throw new SequenceFetchError(pathId, 'not found');
    return manifest;
  }

  frameUrl(pathId: string, file: string): string {
    return `${this.frameBase}/${pathId}/${file}`;
  }
}
