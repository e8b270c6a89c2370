/**
 * Model manifest parsing.
 *
 * A manifest is immutable once parsed: entries are frozen and the
 * accessors only ever hand out readonly views, so one instance can be
 * shared by concurrent operations.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { Readable } from 'node:stream';
import { ParseError, errnoCode, normalizeError } from '../errors.js';
import { isRecord, parseSourceEntry, requireString } from '../validate.js';
import type { FileEntry, ModelSource } from './types.js';

const SHA256_PATTERN = /^[a-fA-F0-9]{64}$/;

export class ModelManifest {
  private readonly sourceMap: ReadonlyMap<string, ModelSource>;

  private constructor(
    public readonly id: string,
    public readonly revision: string,
    public readonly files: readonly FileEntry[],
    sources: ModelSource[],
    public readonly defaultSource: string,
  ) {
    this.sourceMap = new Map(sources.map((s) => [s.name, s]));
    Object.freeze(this);
  }

  // ── Factories ──────────────────────────────────────────────────────

  /** Parse a manifest from JSON text or bytes */
  static parse(content: string | Buffer, origin = 'manifest'): ModelManifest {
    let parsed: unknown;
    try {
      parsed = JSON.parse(typeof content === 'string' ? content : content.toString('utf-8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ParseError(`Failed to parse ${origin} as JSON: ${message}`, [], { cause: err });
    }
    return ModelManifest.fromObject(parsed, origin);
  }

  /**
   * Build a manifest from an already-parsed JSON value, such as a
   * manifest imported into the bundle at build time.
   */
  static fromObject(value: unknown, origin = 'manifest'): ModelManifest {
    const problems: string[] = [];
    const manifest = transformManifest(value, problems);
    if (!manifest || problems.length > 0) {
      throw new ParseError(`Invalid ${origin}`, problems);
    }
    return manifest;
  }

  /** Read a manifest from a byte stream */
  static async fromStream(stream: Readable, origin = 'manifest'): Promise<ModelManifest> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return ModelManifest.parse(Buffer.concat(chunks), origin);
  }

  /** Load a manifest from a file on disk */
  static async fromFile(filePath: string): Promise<ModelManifest> {
    let content: Buffer;
    try {
      content = await readFile(filePath);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new ParseError(`Manifest file not found: ${filePath}`, [], { cause: err });
      }
      throw normalizeError(err);
    }
    return ModelManifest.parse(content, filePath);
  }

  /** @internal used by the transformer */
  static create(
    id: string,
    revision: string,
    files: FileEntry[],
    sources: ModelSource[],
    defaultSource: string,
  ): ModelManifest {
    return new ModelManifest(
      id,
      revision,
      Object.freeze(files.map((f) => Object.freeze({ ...f }))),
      sources.map((s) => Object.freeze({ ...s })),
      defaultSource,
    );
  }

  // ── Accessors ──────────────────────────────────────────────────────

  /** First entry of the file list */
  get primaryFile(): FileEntry {
    return this.files[0];
  }

  get sources(): ReadonlyMap<string, ModelSource> {
    return this.sourceMap;
  }

  get sourceNames(): string[] {
    return Array.from(this.sourceMap.keys());
  }

  getSource(name: string): ModelSource | undefined {
    return this.sourceMap.get(name);
  }

  /** Look up a file entry by its manifest-relative path */
  getFile(filePath: string): FileEntry | undefined {
    return this.files.find((f) => f.path === filePath);
  }

  /** Identity key used by registries: `{id}@{revision}` */
  get key(): string {
    return `${this.id}@${this.revision}`;
  }
}

// ---------------------------------------------------------------------------
// Transform raw JSON to a typed manifest
// ---------------------------------------------------------------------------

function transformFile(raw: unknown, index: number, problems: string[]): FileEntry | undefined {
  const prefix = `model.files[${index}]`;
  if (!isRecord(raw)) {
    problems.push(`'${prefix}' must be an object`);
    return undefined;
  }

  const filePath = requireString(raw, 'path', prefix, problems);
  const sha256 = requireString(raw, 'sha256', prefix, problems);
  if (sha256 !== undefined && !SHA256_PATTERN.test(sha256)) {
    problems.push(`Field '${prefix}.sha256' must be 64 hex characters`);
  }

  let size: number | null = null;
  if (raw['size'] !== undefined && raw['size'] !== null) {
    const rawSize = raw['size'];
    if (typeof rawSize !== 'number' || !Number.isInteger(rawSize) || rawSize < 0) {
      problems.push(`Field '${prefix}.size' must be a non-negative integer or null`);
    } else {
      size = rawSize;
    }
  }

  if (filePath !== undefined) {
    const fileName = path.basename(filePath);
    if (fileName === '' || fileName === '.' || fileName === '..') {
      problems.push(`Field '${prefix}.path' must name a file`);
    }
  }

  if (filePath === undefined || sha256 === undefined) {
    return undefined;
  }
  return { path: filePath, sha256, size };
}

/** Files are cached by basename, so two entries may not share one */
function checkCacheNames(files: FileEntry[], problems: string[]): void {
  const seen = new Map<string, string>();
  for (const file of files) {
    const fileName = path.basename(file.path);
    const first = seen.get(fileName);
    if (first !== undefined) {
      problems.push(`Files '${first}' and '${file.path}' would both be cached as '${fileName}'`);
    } else {
      seen.set(fileName, file.path);
    }
  }
}

function transformManifest(raw: unknown, problems: string[]): ModelManifest | null {
  if (!isRecord(raw)) {
    problems.push('Manifest must be a JSON object');
    return null;
  }

  // --- model ---
  const model = raw['model'];
  if (!isRecord(model)) {
    problems.push("Required section 'model' is missing");
    return null;
  }
  const id = requireString(model, 'id', 'model', problems);
  const revision = requireString(model, 'revision', 'model', problems);

  const rawFiles = model['files'];
  const files: FileEntry[] = [];
  if (!Array.isArray(rawFiles) || rawFiles.length === 0) {
    problems.push("Required field 'model.files' is missing or empty");
  } else {
    rawFiles.forEach((f, i) => {
      const entry = transformFile(f, i, problems);
      if (entry) files.push(entry);
    });
    checkCacheNames(files, problems);
  }

  // --- sources ---
  const rawSources = raw['sources'];
  const sources: ModelSource[] = [];
  if (!isRecord(rawSources)) {
    problems.push("Required section 'sources' is missing or not an object");
  } else {
    for (const [name, entry] of Object.entries(rawSources)) {
      const source = parseSourceEntry(name, entry, `sources.${name}`, problems);
      if (source) sources.push(source);
    }
  }

  // --- defaultSource ---
  const defaultSource = requireString(raw, 'defaultSource', 'manifest', problems);

  if (id === undefined || revision === undefined || defaultSource === undefined || problems.length > 0) {
    return null;
  }

  return ModelManifest.create(id, revision, files, sources, defaultSource);
}
