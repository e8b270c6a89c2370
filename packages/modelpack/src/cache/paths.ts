/**
 * Cache path resolution.
 *
 * Layout: {cacheRoot}/{modelId}/{revision}/{fileName}
 *
 * Cache-root precedence: per-call override → MODELPACK_CACHE_DIR →
 * bundled default → platform user cache directory. Pure functions, no I/O.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import type { FileEntry } from '../manifest/types.js';

export interface CacheRootSources {
  /** Per-call override */
  override?: string | null;

  /** Value of MODELPACK_CACHE_DIR */
  environment?: string | null;

  /** Default declared when the package was constructed */
  bundled?: string | null;
}

/** The part of a manifest that determines where its files live */
export interface CacheIdentity {
  id: string;
  revision: string;
}

/**
 * Platform user cache directory for modelpack.
 *
 * - Windows: %LOCALAPPDATA%\modelpack\cache
 * - Elsewhere: $XDG_CACHE_HOME/modelpack, else ~/.cache/modelpack
 */
export function getDefaultCacheDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): string {
  if (platform === 'win32') {
    const localAppData = env['LOCALAPPDATA'] || path.join(homeDir, 'AppData', 'Local');
    return path.join(localAppData, 'modelpack', 'cache');
  }
  const xdgCache = env['XDG_CACHE_HOME'];
  if (xdgCache) {
    return path.join(xdgCache, 'modelpack');
  }
  return path.join(homeDir, '.cache', 'modelpack');
}

export function resolveCacheRoot(sources: CacheRootSources): string {
  return sources.override || sources.environment || sources.bundled || getDefaultCacheDir();
}

/** Split a slash-namespaced id or revision into safe directory segments */
function safeSegments(value: string): string[] {
  return value.split(/[\\/]+/).filter((s) => s !== '' && s !== '.' && s !== '..');
}

/**
 * Compute the local path for a manifest file.
 * Only the file's basename is kept: "onnx/model.onnx" caches as "model.onnx".
 */
export function getCachePath(cacheRoot: string, identity: CacheIdentity, file: FileEntry): string {
  const revision = safeSegments(identity.revision);
  const fileName = path.basename(file.path);
  return path.join(
    cacheRoot,
    ...safeSegments(identity.id),
    ...(revision.length > 0 ? revision : ['main']),
    fileName,
  );
}

export function getLockPath(cachePath: string): string {
  return `${cachePath}.lock`;
}
