/**
 * Source resolution.
 *
 * Picks the source for a manifest file and builds its download URL.
 *
 * Precedence (highest → lowest):
 * 1. Per-call source that is an absolute http(s):// or file:// URL (used verbatim)
 * 2. Per-call source name
 * 3. MODELPACK_SOURCE environment variable
 * 4. defaultSource of the project-level model-sources file
 * 5. defaultSource of the user-level model-sources file
 * 6. Bundled default declared when the package was constructed
 * 7. Manifest defaultSource
 *
 * A selected name is looked up in the merged config files first, then in
 * the manifest's own sources.
 */

import type { Logger } from 'pino';
import { SourceNotFoundError } from '../errors.js';
import type { ModelManifest } from '../manifest/manifest.js';
import type { FileEntry, ModelSource } from '../manifest/types.js';
import { isLiteralUrl, redactUrl, trimTrailingSlashes } from '../url.js';
import { findConfiguredSource } from './config-loader.js';
import type { MergedSourceConfig, ResolutionLevel, ResolvedSource } from './types.js';

export const DEFAULT_HUGGINGFACE_ENDPOINT = 'https://huggingface.co';

/** Source name reported when the caller passed a literal URL */
export const OPTIONS_DIRECT_SOURCE = 'options-direct';

export interface SourceResolutionContext {
  /** Merged override files */
  config: MergedSourceConfig;

  /** Value of the environment override, if set */
  environmentSource: string | null;

  /** Default declared at construction time, if any */
  bundledSource: string | null;

  logger: Logger;
}

const LEVEL_LABELS: Record<ResolutionLevel, string> = {
  'options-url': 'per-call source URL',
  'options-name': 'per-call source name',
  environment: 'MODELPACK_SOURCE environment variable',
  'project-config': 'project-level model-sources file',
  'user-config': 'user-level model-sources file',
  bundled: 'bundled default',
  manifest: 'manifest defaultSource',
};

/**
 * Choose the source name by precedence. Returns the literal URL instead
 * when the per-call source is one.
 */
export function selectSourceName(
  manifest: ModelManifest,
  requested: string | undefined,
  context: Omit<SourceResolutionContext, 'logger'>,
): { name: string; level: ResolutionLevel } {
  if (requested) {
    if (isLiteralUrl(requested)) {
      return { name: requested, level: 'options-url' };
    }
    return { name: requested, level: 'options-name' };
  }
  if (context.environmentSource) {
    return { name: context.environmentSource, level: 'environment' };
  }
  if (context.config.projectDefault) {
    return { name: context.config.projectDefault, level: 'project-config' };
  }
  if (context.config.userDefault) {
    return { name: context.config.userDefault, level: 'user-config' };
  }
  if (context.bundledSource) {
    return { name: context.bundledSource, level: 'bundled' };
  }
  return { name: manifest.defaultSource, level: 'manifest' };
}

function sourceUrl(source: ModelSource, manifest: ModelManifest, file: FileEntry): string {
  switch (source.type) {
    case 'huggingface': {
      const endpoint = trimTrailingSlashes(source.endpoint ?? DEFAULT_HUGGINGFACE_ENDPOINT);
      const repo = source.repo ?? manifest.id;
      const revision = source.revision ?? (manifest.revision || 'main');
      return `${endpoint}/${repo}/resolve/${revision}/${file.path}`;
    }

    case 'direct':
      if (!source.url) {
        throw new SourceNotFoundError(
          source.name,
          manifest.sourceNames,
          `Direct source '${source.name}' must have a 'url' field.`,
        );
      }
      return source.url;

    case 'mirror': {
      if (!source.endpoint) {
        throw new SourceNotFoundError(
          source.name,
          manifest.sourceNames,
          `Mirror source '${source.name}' must have an 'endpoint' field.`,
        );
      }
      return `${trimTrailingSlashes(source.endpoint)}/${manifest.id}/${file.path}`;
    }
  }
}

/**
 * Build the download URL for one file from a source.
 *
 * @throws SourceNotFoundError when the source lacks the field its kind
 *   needs, or its fields do not form an absolute http(s):// or file:// URL
 */
export function buildSourceUrl(
  source: ModelSource,
  manifest: ModelManifest,
  file: FileEntry,
): string {
  const url = sourceUrl(source, manifest, file);
  if (!isLiteralUrl(url)) {
    const field = source.type === 'direct' ? 'url' : 'endpoint';
    throw new SourceNotFoundError(
      source.name,
      manifest.sourceNames,
      `Source '${source.name}' produced '${redactUrl(url)}', which is not an absolute ` +
        `http(s):// or file:// URL. Check its '${field}' field.`,
    );
  }
  return url;
}

/**
 * Resolve the download URL and source name for a manifest file.
 *
 * @throws SourceNotFoundError when the selected name matches no source,
 *   or the source lacks the field its kind needs
 */
export function resolveSource(
  manifest: ModelManifest,
  file: FileEntry,
  requested: string | undefined,
  context: SourceResolutionContext,
): ResolvedSource {
  const log = context.logger;
  const { name, level } = selectSourceName(manifest, requested, context);

  if (level === 'options-url') {
    log.info(
      { level, from: LEVEL_LABELS[level], url: redactUrl(name), file: file.path },
      'Source resolved: direct URL',
    );
    return { url: name, sourceName: OPTIONS_DIRECT_SOURCE, level };
  }

  const source = findConfiguredSource(context.config, name) ?? manifest.getSource(name);
  if (!source) {
    throw new SourceNotFoundError(name, manifest.sourceNames);
  }

  const url = buildSourceUrl(source, manifest, file);
  log.info(
    { source: name, level, from: LEVEL_LABELS[level], url: redactUrl(url), file: file.path },
    `Source resolved: '${name}' (from ${LEVEL_LABELS[level]})`,
  );

  return { url, sourceName: name, level };
}
