/**
 * Types for model manifests.
 *
 * A manifest declares a model's identity, its ordered file list and the
 * named sources its files can be fetched from.
 */

/** How a source addresses files */
export type SourceKind = 'huggingface' | 'direct' | 'mirror';

export const SOURCE_KINDS: readonly SourceKind[] = ['huggingface', 'direct', 'mirror'];

/** A single file entry in the manifest */
export interface FileEntry {
  /** Path relative to the model root (e.g. "onnx/model.onnx") */
  readonly path: string;

  /** Expected SHA-256 digest, 64 hex chars */
  readonly sha256: string;

  /** Expected size in bytes, when known */
  readonly size: number | null;
}

/** A named, typed origin for a model's files */
export interface ModelSource {
  readonly name: string;
  readonly type: SourceKind;

  /** Base URL (huggingface and mirror) */
  readonly endpoint?: string;

  /** Literal file URL (direct) */
  readonly url?: string;

  /** Hugging Face repository id; defaults to the model id */
  readonly repo?: string;

  /** Branch, tag or commit; defaults to the model revision */
  readonly revision?: string;
}

/** On-disk manifest document shape */
export interface ManifestDocument {
  model: {
    id: string;
    revision: string;
    files: Array<{ path: string; sha256: string; size?: number | null }>;
  };
  sources: Record<
    string,
    {
      type: SourceKind;
      endpoint?: string;
      url?: string;
      repo?: string;
      revision?: string;
    }
  >;
  defaultSource: string;
}
