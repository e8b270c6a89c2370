export {
  getDefaultCacheDir,
  resolveCacheRoot,
  getCachePath,
  getLockPath,
  type CacheRootSources,
  type CacheIdentity,
} from './paths.js';
export {
  FileLock,
  acquireLock,
  withLock,
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_STALE_LOCK_MS,
  type LockOptions,
} from './lock.js';
export { writeAtomically, getPartialPath, type AtomicWriteOptions } from './atomic-writer.js';
