export { ModelManifest } from './manifest.js';
export { SOURCE_KINDS } from './types.js';
export type { FileEntry, ModelSource, SourceKind, ManifestDocument } from './types.js';
