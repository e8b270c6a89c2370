/**
 * Types for source configuration and resolution.
 */

import type { ModelSource } from '../manifest/types.js';

/** Override file names, looked up in this order in each config directory */
export const SOURCE_CONFIG_FILE_NAMES = [
  'model-sources.json',
  'model-sources.yaml',
  'model-sources.yml',
] as const;

/** Which config level supplied a value */
export type ConfigLevel = 'user' | 'project';

/** One parsed override file */
export interface SourceConfigFile {
  /** Absolute path the file was read from */
  path: string;
  level: ConfigLevel;
  sources: ModelSource[];
  defaultSource: string | null;
}

/** User-level and project-level override files merged */
export interface MergedSourceConfig {
  /** Sources keyed by lower-cased name; project entries replace user entries */
  sources: Map<string, ModelSource>;

  /** Last non-empty default (project wins over user) */
  defaultSource: string | null;

  /** Default named by the project-level file, if any */
  projectDefault: string | null;

  /** Default named by the user-level file, if any */
  userDefault: string | null;

  /** Files that were found and loaded, in load order */
  loadedFiles: string[];
}

/** Precedence level that supplied the source */
export type ResolutionLevel =
  | 'options-url'
  | 'options-name'
  | 'environment'
  | 'project-config'
  | 'user-config'
  | 'bundled'
  | 'manifest';

export interface ResolvedSource {
  /** Final download URL */
  url: string;

  /** Selected source name (`options-direct` for a literal URL) */
  sourceName: string;

  level: ResolutionLevel;
}
