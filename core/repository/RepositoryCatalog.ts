import { ExternalOperationError } from '@core/errors';
import { LocalDirectoryRepository } from './LocalDirectoryRepository';
import type { PackageRepository } from './types';

/**
 * Named package repositories available to installs.
 */
export class RepositoryCatalog {
  private readonly repositories = new Map<string, PackageRepository>();

  static fromConfig(repositories: Record<string, string>): RepositoryCatalog {
    const catalog = new RepositoryCatalog();
    for (const [name, root] of Object.entries(repositories)) {
      catalog.register(new LocalDirectoryRepository(name, root));
    }
    return catalog;
  }

  register(repository: PackageRepository): void {
    this.repositories.set(repository.name.toLowerCase(), repository);
  }

  get(name: string): PackageRepository {
    const repository = this.repositories.get(name.toLowerCase());
    if (!repository) {
      throw new ExternalOperationError(
        `Unknown repository '${name}'. Known: ${this.names().join(', ') || 'none'}`,
        'find',
        undefined,
        { repository: name }
      );
    }
    return repository;
  }

  names(): string[] {
    return [...this.repositories.values()].map(repository => repository.name);
  }
}
