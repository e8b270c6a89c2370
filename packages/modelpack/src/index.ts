/**
 * modelpack: declarative model file distribution.
 *
 * Resolves the files a manifest lists to verified local paths,
 * downloading them on first use into a shared cache.
 */

export * from './errors.js';
export {
  ENV,
  DEFAULT_RUNTIME_CONFIG,
  buildRuntimeConfig,
  validateRuntimeConfig,
  type RuntimeConfig,
} from './config.js';
export { createLogger } from './logger.js';
export { VERSION, USER_AGENT } from './version.js';
export { isLiteralUrl, redactUrl } from './url.js';
export * from './manifest/index.js';
export * from './sources/index.js';
export * from './cache/index.js';
export * from './download/index.js';
export * from './integrity/index.js';
export * from './package/index.js';
