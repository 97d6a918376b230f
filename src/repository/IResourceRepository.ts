import type { Resource } from '../domain/resource';

export interface ResourceRepository {
  /** Fails with `DuplicateResourceError` when the id is taken. */
  insert(resource: Resource): Promise<void>;
  update(resource: Resource): Promise<void>;
  findAll(): Promise<Resource[]>;
}
