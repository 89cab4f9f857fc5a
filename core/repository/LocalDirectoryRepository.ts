import * as fs from 'fs';
import * as path from 'path';
import { ExternalOperationError, getErrorMessage } from '@core/errors';
import { findPackageDirectory, listVersionDirectories, readManifest, MANIFEST_FILE } from '@core/host/manifest';
import { isPrerelease, safeSatisfies } from '@core/utils/version-checker';
import { repositoryLogger as logger } from '@core/utils/logger';
import type { FindOptions, PackageRepository, RepositoryPackage } from './types';

/**
 * Repository backed by a directory laid out as <root>/<Name>/<Version>/.
 */
export class LocalDirectoryRepository implements PackageRepository {
  constructor(
    public readonly name: string,
    private readonly root: string
  ) {}

  async find(name: string, options: FindOptions = {}): Promise<RepositoryPackage[]> {
    const packageDir = await findPackageDirectory(this.root, name);
    if (!packageDir) {
      logger.debug(`Package ${name} not present in repository ${this.name}`, { root: this.root });
      return [];
    }

    const results: RepositoryPackage[] = [];
    for (const version of await listVersionDirectories(packageDir)) {
      if (!options.allowPrerelease && isPrerelease(version)) {
        continue;
      }
      if (!safeSatisfies(version, options.version)) {
        continue;
      }

      const location = path.join(packageDir, version);
      const manifest = await readManifest(path.join(location, MANIFEST_FILE));
      results.push({
        name: manifest.name,
        version: manifest.version,
        repository: this.name,
        location,
        manifest
      });
    }

    return results;
  }

  async save(pkg: RepositoryPackage, destination: string): Promise<string> {
    const target = path.join(destination, pkg.name, pkg.version);

    try {
      await fs.promises.rm(target, { recursive: true, force: true });
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.cp(pkg.location, target, { recursive: true });
    } catch (error) {
      throw new ExternalOperationError(
        `Failed to save ${pkg.name} ${pkg.version} from ${this.name}: ${getErrorMessage(error)}`,
        'save',
        error,
        { packageName: pkg.name, version: pkg.version, destination }
      );
    }

    logger.debug(`Saved ${pkg.name} ${pkg.version}`, { target });
    return target;
  }
}
