export { ModelPackage } from './model-package.js';
export { ModelFiles } from './model-files.js';
export { ModelPackageRegistry } from './registry.js';
export type {
  BundledDefaults,
  EnsureOptions,
  LocateOptions,
  ModelInfo,
  ModelPackageDependencies,
} from './types.js';
