import { describe, expect, it } from 'vitest';

import {
  DuplicateResourceError,
  NotFoundError,
  StorageUnavailableError,
  ValidationError
} from '@makerspace/shared';

import { ResourceLockManager } from '../../../src/application/resourceLock';
import type { Resource } from '../../../src/domain/resource';
import { ResourceRegistry } from '../../../src/modules/registry/application/resourceRegistry';
import { InMemoryResourceRepository } from '../../../src/repository/InMemoryResourceRepository';
import { TestClock } from '../../setup/buildCore';

function buildRegistry() {
  const repository = new InMemoryResourceRepository();
  const clock = new TestClock();
  return { registry: new ResourceRegistry(repository, clock.now), repository, clock };
}

describe('ResourceRegistry', () => {
  it('registers a resource with defaults', async () => {
    const { registry } = buildRegistry();

    const id = await registry.register({ id: 'laser-1', kind: 'machine' });
    const resource = registry.get(id);

    expect(resource).toMatchObject({
      id: 'laser-1',
      kind: 'machine',
      name: 'laser-1',
      capacity: 1,
      certificationRequired: false
    });
    expect(Object.isFrozen(resource)).toBe(true);
  });

  it('refuses duplicate ids', async () => {
    const { registry } = buildRegistry();
    await registry.register({ id: 'laser-1', kind: 'machine' });

    await expect(registry.register({ id: 'laser-1', kind: 'space' })).rejects.toBeInstanceOf(
      DuplicateResourceError
    );
  });

  it('refuses concurrent registrations of the same id', async () => {
    const { registry } = buildRegistry();

    const results = await Promise.allSettled([
      registry.register({ id: 'bench', kind: 'space', capacity: 4 }),
      registry.register({ id: 'bench', kind: 'space', capacity: 4 })
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
  });

  it('rejects non-positive or fractional capacity', async () => {
    const { registry } = buildRegistry();

    await expect(registry.register({ id: 'a', kind: 'space', capacity: 0 })).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(registry.register({ id: 'b', kind: 'space', capacity: 1.5 })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(registry.has('a')).toBe(false);
  });

  it('throws NotFound for unknown ids but find returns undefined', () => {
    const { registry } = buildRegistry();

    expect(() => registry.get('ghost')).toThrow(NotFoundError);
    expect(registry.find('ghost')).toBeUndefined();
  });

  it('lists by kind in id order', async () => {
    const { registry } = buildRegistry();
    await registry.register({ id: 'zeta-lathe', kind: 'machine' });
    await registry.register({ id: 'alpha-room', kind: 'space', capacity: 10 });
    await registry.register({ id: 'alpha-laser', kind: 'machine' });

    expect(registry.list().map((r) => r.id)).toEqual(['alpha-laser', 'alpha-room', 'zeta-lathe']);
    expect(registry.list('machine').map((r) => r.id)).toEqual(['alpha-laser', 'zeta-lathe']);
  });

  it('updates capacity and the certification flag with a new timestamp', async () => {
    const { registry, clock } = buildRegistry();
    await registry.register({ id: 'room', kind: 'space', capacity: 2 });
    clock.advance(60_000);

    const updated = await registry.updateCapacity('room', 5);

    expect(updated.capacity).toBe(5);
    expect(updated.updatedAt.toISOString()).toBe('2030-03-01T08:01:00.000Z');
    expect(updated.createdAt.toISOString()).toBe('2030-03-01T08:00:00.000Z');

    const flagged = await registry.setCertificationRequired('room', true);
    expect(flagged.certificationRequired).toBe(true);
    expect(flagged.capacity).toBe(5);
  });

  it('applies concurrent edits to one resource one after the other', async () => {
    const { registry, repository } = buildRegistry();
    await registry.register({ id: 'lathe', kind: 'machine' });

    await Promise.all([
      registry.updateCapacity('lathe', 4),
      registry.setCertificationRequired('lathe', true)
    ]);

    expect(registry.get('lathe')).toMatchObject({ capacity: 4, certificationRequired: true });
    const [stored] = await repository.findAll();
    expect(stored).toMatchObject({ id: 'lathe', capacity: 4, certificationRequired: true });
  });

  it('holds a resource edit while the resource lock is taken', async () => {
    const repository = new InMemoryResourceRepository();
    const locks = new ResourceLockManager(1000);
    const registry = new ResourceRegistry(repository, new TestClock().now, locks);
    await registry.register({ id: 'room', kind: 'space', capacity: 2 });

    const release = await locks.acquire('room');
    const pending = registry.updateCapacity('room', 6);
    await Promise.resolve();

    expect(locks.waiting('room')).toBe(1);
    expect(registry.get('room').capacity).toBe(2);

    release();
    await expect(pending).resolves.toMatchObject({ capacity: 6 });
    expect(locks.isLocked('room')).toBe(false);
  });

  it('writes through and reloads from the repository', async () => {
    const { registry, repository, clock } = buildRegistry();
    await registry.register({ id: 'laser-1', kind: 'machine', certificationRequired: true });
    await registry.updateCapacity('laser-1', 2);

    const reloaded = new ResourceRegistry(repository, clock.now);
    await reloaded.load();

    expect(reloaded.get('laser-1')).toMatchObject({ capacity: 2, certificationRequired: true });
  });

  it('reports storage faults as StorageUnavailableError and keeps no partial state', async () => {
    const failing = {
      insert: async (_resource: Resource) => {
        throw new Error('connection reset');
      },
      update: async (_resource: Resource) => undefined,
      findAll: async () => []
    };
    const registry = new ResourceRegistry(failing);

    await expect(registry.register({ id: 'laser-1', kind: 'machine' })).rejects.toBeInstanceOf(
      StorageUnavailableError
    );
    expect(registry.has('laser-1')).toBe(false);
  });
});
