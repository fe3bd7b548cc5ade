export { FileArtifactStore, MemoryArtifactStore } from './artifact-store.js'
export type { ArtifactStore } from './artifact-store.js'
export { Publisher } from './publisher.js'
export type { PublishResult } from './publisher.js'
