/**
 * Model package orchestrator.
 *
 * Turns a manifest into verified local files:
 * fast validity check → source resolution → per-path lock → re-check →
 * atomic download + verify → release.
 *
 * Instances are constructed explicitly and hold no mutable state beyond
 * their dependencies, so one instance can serve concurrent callers.
 */

import * as path from 'node:path';
import { rm } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import type { Logger } from 'pino';
import { buildRuntimeConfig, validateRuntimeConfig } from '../config.js';
import type { RuntimeConfig } from '../config.js';
import { ParseError, errnoCode, normalizeError, throwIfCancelled } from '../errors.js';
import { createLogger } from '../logger.js';
import { ModelManifest } from '../manifest/manifest.js';
import type { FileEntry } from '../manifest/types.js';
import { getCachePath, resolveCacheRoot } from '../cache/paths.js';
import { withLock } from '../cache/lock.js';
import { writeAtomically } from '../cache/atomic-writer.js';
import { download } from '../download/downloader.js';
import type { FetchLike } from '../download/types.js';
import { isValidFile, verifyFile as verifyIntegrity } from '../integrity/verifier.js';
import { loadSourceConfig } from '../sources/config-loader.js';
import { resolveSource } from '../sources/resolver.js';
import type { MergedSourceConfig, ResolvedSource } from '../sources/types.js';
import { redactUrl } from '../url.js';
import { ModelFiles } from './model-files.js';
import type {
  BundledDefaults,
  EnsureOptions,
  LocateOptions,
  ModelInfo,
  ModelPackageDependencies,
} from './types.js';

export class ModelPackage {
  public readonly config: RuntimeConfig;
  private readonly logger: Logger;
  private readonly fetchImpl?: FetchLike;
  private readonly bundled: BundledDefaults;

  /**
   * @throws ParseError when the runtime configuration is invalid
   */
  constructor(
    public readonly manifest: ModelManifest,
    deps: ModelPackageDependencies = {},
  ) {
    this.config = buildRuntimeConfig(deps.config);
    const errors = validateRuntimeConfig(this.config);
    if (errors.length > 0) {
      throw new ParseError('Invalid runtime configuration', errors);
    }
    this.logger = (deps.logger ?? createLogger()).child({
      component: 'model-package',
      model: manifest.key,
    });
    this.fetchImpl = deps.fetch;
    this.bundled = deps.bundled ?? {};
  }

  // ── Factories ──────────────────────────────────────────────────────

  static async fromManifestFile(
    filePath: string,
    deps?: ModelPackageDependencies,
  ): Promise<ModelPackage> {
    return new ModelPackage(await ModelManifest.fromFile(filePath), deps);
  }

  static async fromManifestStream(
    stream: Readable,
    deps?: ModelPackageDependencies,
  ): Promise<ModelPackage> {
    return new ModelPackage(await ModelManifest.fromStream(stream), deps);
  }

  static fromManifestString(content: string, deps?: ModelPackageDependencies): ModelPackage {
    return new ModelPackage(ModelManifest.parse(content), deps);
  }

  /**
   * Build from a manifest imported as JSON, e.g.
   * `import manifest from './model.manifest.json' with { type: 'json' }`.
   */
  static fromManifestObject(value: unknown, deps?: ModelPackageDependencies): ModelPackage {
    return new ModelPackage(ModelManifest.fromObject(value), deps);
  }

  // ── Ensure ─────────────────────────────────────────────────────────

  /**
   * Make sure one manifest file is cached and verified.
   *
   * @returns Absolute path of the cached file
   */
  async ensureFile(file: FileEntry, options: EnsureOptions = {}): Promise<string> {
    const sourceConfig = await this.loadSourceConfig();
    return this.ensureOne(file, options, sourceConfig);
  }

  /** Ensure the primary file */
  async ensureModel(options: EnsureOptions = {}): Promise<string> {
    return this.ensureFile(this.manifest.primaryFile, options);
  }

  /**
   * Ensure every manifest file, in manifest order.
   * With `concurrency` above 1, files are processed in parallel batches.
   */
  async ensureFiles(options: EnsureOptions = {}): Promise<ModelFiles> {
    const sourceConfig = await this.loadSourceConfig();
    const concurrency = Math.max(1, options.concurrency ?? 1);
    const entries = this.manifest.files;
    const localPaths: string[] = [];

    for (let i = 0; i < entries.length; i += concurrency) {
      const batch = entries.slice(i, i + concurrency);
      const batchPaths = await Promise.all(
        batch.map((entry) => this.ensureOne(entry, options, sourceConfig)),
      );
      localPaths.push(...batchPaths);
    }

    return new ModelFiles(
      new Map(entries.map((entry, i) => [entry.path, localPaths[i]])),
      localPaths[0],
    );
  }

  private async ensureOne(
    file: FileEntry,
    options: EnsureOptions,
    sourceConfig: MergedSourceConfig,
  ): Promise<string> {
    const { signal } = options;
    const force = options.forceRedownload ?? false;

    try {
      throwIfCancelled(signal);
      const cachePath = this.cachePathFor(file, options);

      if (!force && (await isValidFile(cachePath, file.sha256, file.size, { signal }))) {
        this.logger.debug({ file: file.path, cachePath }, 'Cache hit');
        return cachePath;
      }

      const resolved = this.resolve(file, options, sourceConfig);

      await withLock(
        cachePath,
        async () => {
          // Another caller may have filled the cache while we waited
          if (!force && (await isValidFile(cachePath, file.sha256, file.size, { signal }))) {
            this.logger.debug({ file: file.path, cachePath }, 'Cache filled while waiting for lock');
            return;
          }

          await writeAtomically(
            cachePath,
            async (tempPath) => {
              await download(resolved.url, tempPath, {
                token: options.token ?? this.config.token,
                signal,
                onProgress: options.onProgress,
                logger: this.logger,
                fetch: this.fetchImpl,
                maxAttempts: this.config.maxAttempts,
                retryBaseDelayMs: this.config.retryBaseDelayMs,
                progressIntervalMs: this.config.progressIntervalMs,
              });
              await verifyIntegrity(tempPath, file.sha256, file.size, { signal });
            },
            { logger: this.logger },
          );

          this.logger.info(
            { file: file.path, cachePath, source: resolved.sourceName },
            'File cached and verified',
          );
        },
        {
          timeoutMs: this.config.lockTimeoutMs,
          staleMs: this.config.staleLockMs,
          signal,
          logger: this.logger,
        },
      );

      return cachePath;
    } catch (err) {
      throw normalizeError(err);
    }
  }

  // ── Info ───────────────────────────────────────────────────────────

  /**
   * Describe where a file would be downloaded from and cached.
   * Reads the override files but never writes to disk or touches the network.
   */
  async getFileInfo(file: FileEntry, options: LocateOptions = {}): Promise<ModelInfo> {
    const sourceConfig = await this.loadSourceConfig();
    return this.describe(file, options, sourceConfig);
  }

  async getModelInfo(options: LocateOptions = {}): Promise<ModelInfo> {
    return this.getFileInfo(this.manifest.primaryFile, options);
  }

  async getFilesInfo(options: LocateOptions = {}): Promise<ModelInfo[]> {
    const sourceConfig = await this.loadSourceConfig();
    return this.manifest.files.map((file) => this.describe(file, options, sourceConfig));
  }

  private describe(
    file: FileEntry,
    options: LocateOptions,
    sourceConfig: MergedSourceConfig,
  ): ModelInfo {
    const resolved = this.resolve(file, options, sourceConfig);
    const localPath = this.cachePathFor(file, options);
    return {
      modelId: this.manifest.id,
      revision: this.manifest.revision,
      filePath: file.path,
      fileName: path.basename(localPath),
      sha256: file.sha256,
      expectedBytes: file.size,
      sourceName: resolved.sourceName,
      resolutionLevel: resolved.level,
      url: redactUrl(resolved.url),
      localPath,
    };
  }

  // ── Verify ─────────────────────────────────────────────────────────

  /**
   * Re-verify a cached file without any network access.
   * A file that fails is deleted.
   *
   * @returns The verified path
   * @throws NotFoundError when the file is not cached
   */
  async verifyFile(file: FileEntry, options: LocateOptions = {}): Promise<string> {
    const cachePath = this.cachePathFor(file, options);
    try {
      await verifyIntegrity(cachePath, file.sha256, file.size, { signal: options.signal });
    } catch (err) {
      throw normalizeError(err);
    }
    this.logger.debug({ file: file.path, cachePath }, 'Cached file verified');
    return cachePath;
  }

  async verifyModel(options: LocateOptions = {}): Promise<string> {
    return this.verifyFile(this.manifest.primaryFile, options);
  }

  /** Verify every file in manifest order; stops at the first failure */
  async verifyFiles(options: LocateOptions = {}): Promise<ModelFiles> {
    const localPaths: string[] = [];
    for (const file of this.manifest.files) {
      localPaths.push(await this.verifyFile(file, options));
    }
    return new ModelFiles(
      new Map(this.manifest.files.map((entry, i) => [entry.path, localPaths[i]])),
      localPaths[0],
    );
  }

  // ── Clear ──────────────────────────────────────────────────────────

  /**
   * Delete every cached file of this model.
   *
   * @returns The paths that were actually removed
   */
  async clearCache(options: LocateOptions = {}): Promise<string[]> {
    const removed: string[] = [];
    for (const file of this.manifest.files) {
      throwIfCancelled(options.signal);
      const cachePath = this.cachePathFor(file, options);
      try {
        await rm(cachePath);
        removed.push(cachePath);
      } catch (err) {
        if (errnoCode(err) === 'ENOENT') continue;
        throw normalizeError(err);
      }
    }
    this.logger.info({ removed: removed.length }, 'Cache cleared');
    return removed;
  }

  // ── Helpers ────────────────────────────────────────────────────────

  /** Local path of a file, honouring the per-call cache root */
  getCachePath(file: FileEntry, options: Pick<LocateOptions, 'cacheDir'> = {}): string {
    return this.cachePathFor(file, options);
  }

  private cachePathFor(file: FileEntry, options: Pick<LocateOptions, 'cacheDir'>): string {
    const cacheRoot = resolveCacheRoot({
      override: options.cacheDir,
      environment: this.config.cacheDir,
      bundled: this.bundled.cacheDir,
    });
    return getCachePath(cacheRoot, this.manifest, file);
  }

  private resolve(
    file: FileEntry,
    options: LocateOptions,
    sourceConfig: MergedSourceConfig,
  ): ResolvedSource {
    return resolveSource(this.manifest, file, options.source, {
      config: sourceConfig,
      environmentSource: this.config.sourceOverride,
      bundledSource: this.bundled.source ?? null,
      logger: this.logger,
    });
  }

  private async loadSourceConfig(): Promise<MergedSourceConfig> {
    try {
      return await loadSourceConfig({
        userDir: this.config.userConfigDir,
        projectDir: this.config.projectConfigDir,
      });
    } catch (err) {
      throw normalizeError(err);
    }
  }
}
