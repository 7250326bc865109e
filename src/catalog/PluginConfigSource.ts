import { CatalogError } from "../errors.js";
import type { StorageRepository } from "../repository/StorageRepository.js";
import { joinPath } from "../utils/path.js";

/**
 * A catalog entry whose manifest lives in a GitHub repository.
 */
export interface GithubPluginRef {
  name: string;
  repo: string;
  ref?: string;
}

/**
 * Supplies the raw manifest text of a cataloged plugin.
 */
export interface PluginConfigSource {
  read(plugin: GithubPluginRef): Promise<string>;
}

/**
 * Reads manifests from local clones laid out as `<checkoutsDir>/<owner>/<repo>`.
 * The working tree is used as is; `ref` is not checked out.
 */
export class CheckoutConfigSource implements PluginConfigSource {
  constructor(
    private readonly repository: StorageRepository,
    private readonly checkoutsDir: string,
    private readonly manifestPath: string
  ) {}

  async read(plugin: GithubPluginRef): Promise<string> {
    const filePath = joinPath(this.checkoutsDir, plugin.repo, this.manifestPath);

    if (!(await this.repository.exists(filePath))) {
      throw new CatalogError(`Plugin manifest not found for ${plugin.name}: ${filePath}`);
    }

    return this.repository.readFile(filePath);
  }
}
