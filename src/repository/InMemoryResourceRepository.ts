import { DuplicateResourceError, NotFoundError } from '@makerspace/shared';

import type { Resource, ResourceId } from '../domain/resource';
import type { ResourceRepository } from './IResourceRepository';

export class InMemoryResourceRepository implements ResourceRepository {
  private readonly rows = new Map<ResourceId, Resource>();

  async insert(resource: Resource): Promise<void> {
    if (this.rows.has(resource.id)) {
      throw new DuplicateResourceError('Resource already exists', { resourceId: resource.id });
    }
    this.rows.set(resource.id, { ...resource });
  }

  async update(resource: Resource): Promise<void> {
    if (!this.rows.has(resource.id)) {
      throw new NotFoundError('Resource not found', { resourceId: resource.id });
    }
    this.rows.set(resource.id, { ...resource });
  }

  async findAll(): Promise<Resource[]> {
    return Array.from(this.rows.values(), (row) => ({ ...row }));
  }
}
