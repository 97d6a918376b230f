import {
  DuplicateResourceError,
  NotFoundError,
  ValidationError,
  logger
} from '@makerspace/shared';

import { persist } from '../../../application/persistence';
import { ResourceLockManager } from '../../../application/resourceLock';
import type {
  RegisterResourceInput,
  Resource,
  ResourceId,
  ResourceKind
} from '../../../domain/resource';
import type { ResourceRepository } from '../../../repository/IResourceRepository';

function assertCapacity(capacity: number, resourceId: ResourceId): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new ValidationError('Capacity must be a positive integer', { resourceId, capacity });
  }
}

/**
 * In-process catalog of bookable resources, written through to the repository.
 * Descriptors handed out are frozen; edits replace them. Edits to one
 * descriptor run one at a time under that resource's lock.
 */
export class ResourceRegistry {
  private readonly resources = new Map<ResourceId, Readonly<Resource>>();
  private readonly registering = new Set<ResourceId>();

  constructor(
    private readonly repository: ResourceRepository,
    private readonly clock: () => Date = () => new Date(),
    private readonly locks: ResourceLockManager = new ResourceLockManager()
  ) {}

  async load(): Promise<void> {
    const stored = await persist('resources.findAll', () => this.repository.findAll());
    this.resources.clear();
    for (const resource of stored) {
      this.resources.set(resource.id, Object.freeze({ ...resource }));
    }
    logger.info({ resources: stored.length }, 'Resource registry loaded');
  }

  async register(input: RegisterResourceInput): Promise<ResourceId> {
    const capacity = input.capacity ?? 1;
    assertCapacity(capacity, input.id);

    if (this.resources.has(input.id) || this.registering.has(input.id)) {
      throw new DuplicateResourceError('Resource already exists', { resourceId: input.id });
    }

    const now = this.clock();
    const resource: Resource = {
      id: input.id,
      kind: input.kind,
      name: input.name ?? input.id,
      capacity,
      certificationRequired: input.certificationRequired ?? false,
      createdAt: now,
      updatedAt: now
    };

    this.registering.add(input.id);
    try {
      await persist('resources.insert', () => this.repository.insert(resource), {
        resourceId: resource.id
      });
      this.resources.set(resource.id, Object.freeze(resource));
    } finally {
      this.registering.delete(input.id);
    }

    logger.info({ resourceId: resource.id, kind: resource.kind, capacity }, 'Resource registered');
    return resource.id;
  }

  get(id: ResourceId): Readonly<Resource> {
    const resource = this.resources.get(id);
    if (!resource) {
      throw new NotFoundError('Resource not found', { resourceId: id });
    }
    return resource;
  }

  find(id: ResourceId): Readonly<Resource> | undefined {
    return this.resources.get(id);
  }

  has(id: ResourceId): boolean {
    return this.resources.has(id);
  }

  list(kind?: ResourceKind): Readonly<Resource>[] {
    return Array.from(this.resources.values())
      .filter((resource) => kind === undefined || resource.kind === kind)
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  /** Takes effect for future bookings only; existing reservations stand. */
  async updateCapacity(id: ResourceId, capacity: number): Promise<Readonly<Resource>> {
    assertCapacity(capacity, id);
    return this.replace(id, { capacity });
  }

  async setCertificationRequired(id: ResourceId, required: boolean): Promise<Readonly<Resource>> {
    const resource = this.get(id);
    if (required && resource.kind !== 'machine') {
      logger.warn(
        { resourceId: id, kind: resource.kind },
        'Certification flag set on a non-machine resource has no effect on bookings'
      );
    }
    return this.replace(id, { certificationRequired: required });
  }

  private async replace(
    id: ResourceId,
    changes: Partial<Pick<Resource, 'capacity' | 'certificationRequired'>>
  ): Promise<Readonly<Resource>> {
    this.get(id);

    return this.locks.runExclusive(id, async () => {
      const current = this.get(id);
      const updated: Resource = { ...current, ...changes, updatedAt: this.clock() };

      await persist('resources.update', () => this.repository.update(updated), { resourceId: id });
      const frozen = Object.freeze(updated);
      this.resources.set(id, frozen);

      logger.info({ resourceId: id, ...changes }, 'Resource updated');
      return frozen;
    });
  }
}
