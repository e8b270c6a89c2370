/**
 * Field validation helpers shared by the manifest parser and the
 * source-config loader. Problems are collected, not thrown, so one
 * ParseError can report every missing field at once.
 */

import { SOURCE_KINDS } from './manifest/types.js';
import type { ModelSource, SourceKind } from './manifest/types.js';

export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a required non-empty string field */
export function requireString(
  obj: RawRecord,
  field: string,
  prefix: string,
  problems: string[],
): string | undefined {
  const value = obj[field];
  if (value === undefined || value === null) {
    problems.push(`Required field '${prefix}.${field}' is missing`);
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    problems.push(`Field '${prefix}.${field}' must be a non-empty string`);
    return undefined;
  }
  return value;
}

/** Read an optional string field; empty strings count as absent */
export function optionalString(
  obj: RawRecord,
  field: string,
  prefix: string,
  problems: string[],
): string | undefined {
  const value = obj[field];
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    problems.push(`Field '${prefix}.${field}' must be a string`);
    return undefined;
  }
  return value;
}

function isSourceKind(value: string): value is SourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}

/**
 * Parse the kind-specific fields of a source entry.
 * `type` is matched case-insensitively.
 */
export function parseSourceEntry(
  name: string,
  raw: unknown,
  prefix: string,
  problems: string[],
): ModelSource | undefined {
  if (!isRecord(raw)) {
    problems.push(`Source '${prefix}' must be an object`);
    return undefined;
  }

  const rawType = requireString(raw, 'type', prefix, problems);
  if (rawType === undefined) {
    return undefined;
  }
  const type = rawType.toLowerCase();
  if (!isSourceKind(type)) {
    problems.push(
      `Invalid source type '${rawType}' at '${prefix}.type'. Must be one of: ${SOURCE_KINDS.join(', ')}`,
    );
    return undefined;
  }

  return {
    name,
    type,
    endpoint: optionalString(raw, 'endpoint', prefix, problems),
    url: optionalString(raw, 'url', prefix, problems),
    repo: optionalString(raw, 'repo', prefix, problems),
    revision: optionalString(raw, 'revision', prefix, problems),
  };
}
