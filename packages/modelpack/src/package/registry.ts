/**
 * Registry of model packages.
 *
 * Applications create one at startup and register each package they
 * ship; lookups are by model id and, optionally, revision.
 */

import type { ModelPackage } from './model-package.js';

export class ModelPackageRegistry {
  private readonly packages = new Map<string, ModelPackage>();

  /**
   * Add a package under `{id}@{revision}`. Registering the same instance
   * twice is a no-op.
   *
   * @throws Error when a different package already holds the key
   */
  register(pkg: ModelPackage): ModelPackage {
    const key = pkg.manifest.key;
    const existing = this.packages.get(key);
    if (existing !== undefined && existing !== pkg) {
      throw new Error(`A different package is already registered as ${key}`);
    }
    this.packages.set(key, pkg);
    return pkg;
  }

  /**
   * Look up a package. Without a revision, the first one registered for
   * the id is returned.
   */
  get(id: string, revision?: string): ModelPackage | undefined {
    if (revision !== undefined) {
      return this.packages.get(`${id}@${revision}`);
    }
    return this.list().find((pkg) => pkg.manifest.id === id);
  }

  has(id: string, revision?: string): boolean {
    return this.get(id, revision) !== undefined;
  }

  list(): ModelPackage[] {
    return Array.from(this.packages.values());
  }

  get size(): number {
    return this.packages.size;
  }
}
