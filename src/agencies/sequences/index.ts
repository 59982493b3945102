export { parseSequenceManifest, isManifestPose, HttpSequenceStore, CachingSequenceStore } from './sequenceStore';
export type { HttpSequenceStoreOptions } from './sequenceStore';
export { MemorySequenceStore } from './memorySequenceStore';
export type { SequenceFrame, SequenceManifest, SequenceStore, FetchLike } from './types';
export { createSyntheticStore, syntheticManifest, syntheticManifests, frameFile } from './testUtilities';
