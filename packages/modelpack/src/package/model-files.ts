import * as path from 'node:path';

/**
 * Local paths of every file of a model, keyed by manifest path.
 */
export class ModelFiles {
  constructor(
    public readonly files: ReadonlyMap<string, string>,
    public readonly primaryPath: string,
  ) {}

  /** Directory holding the primary file */
  get modelDirectory(): string {
    return path.dirname(this.primaryPath);
  }

  /**
   * Local path for a manifest path such as "onnx/model.onnx".
   *
   * @throws Error when the manifest does not list the file
   */
  getPath(manifestPath: string): string {
    const localPath = this.files.get(manifestPath);
    if (localPath === undefined) {
      const available = Array.from(this.files.keys()).join(', ');
      throw new Error(`File '${manifestPath}' is not part of this model. Available files: ${available}`);
    }
    return localPath;
  }

  hasFile(manifestPath: string): boolean {
    return this.files.has(manifestPath);
  }
}
