/**
 * Source configuration loader.
 *
 * Reads optional model-sources override files from the user-level
 * directory and then the project-level directory, and merges them:
 * sources merge by name (case-insensitive) with the project file winning,
 * and the last non-empty defaultSource wins. JSON files go through the
 * YAML parser too, since JSON is a subset of YAML.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { ParseError, errnoCode, normalizeError } from '../errors.js';
import { isRecord, optionalString, parseSourceEntry, requireString } from '../validate.js';
import type { ModelSource } from '../manifest/types.js';
import { SOURCE_CONFIG_FILE_NAMES } from './types.js';
import type { ConfigLevel, MergedSourceConfig, SourceConfigFile } from './types.js';

export interface SourceConfigLocations {
  /** Directory holding the user-level file (e.g. ~/.modelpack) */
  userDir: string;

  /** Directory holding the project-level file (e.g. the working directory) */
  projectDir: string;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse the text of one override file.
 *
 * @param content - Raw file content (JSON or YAML)
 * @param origin - Path or label used in error messages
 * @throws ParseError when the content is malformed
 */
export function parseSourceConfig(
  content: string,
  origin: string,
  level: ConfigLevel,
): SourceConfigFile {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ParseError(`Failed to parse ${origin}: ${message}`, [], { cause: err });
  }

  // An empty file configures nothing
  if (parsed === undefined || parsed === null) {
    return { path: origin, level, sources: [], defaultSource: null };
  }

  if (!isRecord(parsed)) {
    throw new ParseError(`Invalid ${origin}`, ['Config file must contain an object']);
  }

  const problems: string[] = [];
  const sources: ModelSource[] = [];

  const rawSources = parsed['sources'];
  if (rawSources !== undefined && rawSources !== null) {
    if (!Array.isArray(rawSources)) {
      problems.push("Field 'sources' must be an array");
    } else {
      rawSources.forEach((entry: unknown, i) => {
        const prefix = `sources[${i}]`;
        if (!isRecord(entry)) {
          problems.push(`'${prefix}' must be an object`);
          return;
        }
        const name = requireString(entry, 'name', prefix, problems);
        if (name === undefined) return;
        const source = parseSourceEntry(name, entry, prefix, problems);
        if (source) sources.push(source);
      });
    }
  }

  const defaultSource = optionalString(parsed, 'defaultSource', 'config', problems) ?? null;

  if (problems.length > 0) {
    throw new ParseError(`Invalid ${origin}`, problems);
  }

  return { path: origin, level, sources, defaultSource };
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Read the first override file present in a directory.
 * Returns null when the directory has none.
 */
export async function readSourceConfigFile(
  dir: string,
  level: ConfigLevel,
): Promise<SourceConfigFile | null> {
  for (const fileName of SOURCE_CONFIG_FILE_NAMES) {
    const filePath = path.join(dir, fileName);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (err) {
      const code = errnoCode(err);
      if (code === 'ENOENT' || code === 'ENOTDIR') continue;
      throw normalizeError(err);
    }
    return parseSourceConfig(content, filePath, level);
  }
  return null;
}

/** Merge parsed files in load order; later files win */
export function mergeSourceConfigs(files: SourceConfigFile[]): MergedSourceConfig {
  const merged: MergedSourceConfig = {
    sources: new Map(),
    defaultSource: null,
    projectDefault: null,
    userDefault: null,
    loadedFiles: [],
  };

  for (const file of files) {
    merged.loadedFiles.push(file.path);
    for (const source of file.sources) {
      merged.sources.set(source.name.toLowerCase(), source);
    }
    if (file.defaultSource) {
      merged.defaultSource = file.defaultSource;
      if (file.level === 'project') {
        merged.projectDefault = file.defaultSource;
      } else {
        merged.userDefault = file.defaultSource;
      }
    }
  }

  return merged;
}

/**
 * Load and merge the user-level and project-level override files.
 * Missing files are not an error.
 */
export async function loadSourceConfig(
  locations: SourceConfigLocations,
): Promise<MergedSourceConfig> {
  const files: SourceConfigFile[] = [];

  const userFile = await readSourceConfigFile(locations.userDir, 'user');
  if (userFile) files.push(userFile);

  // The same directory at both levels would load one file twice
  if (path.resolve(locations.projectDir) !== path.resolve(locations.userDir)) {
    const projectFile = await readSourceConfigFile(locations.projectDir, 'project');
    if (projectFile) files.push(projectFile);
  }

  return mergeSourceConfigs(files);
}

/** Find a configured source by name, ignoring case */
export function findConfiguredSource(
  config: MergedSourceConfig,
  name: string,
): ModelSource | undefined {
  return config.sources.get(name.toLowerCase());
}
