import {
  config,
  getEventBus,
  logger,
  type AppConfig,
  type IEventBus
} from '@makerspace/shared';

import { AvailabilityService } from '../modules/availability/application/availabilityService';
import { AvailabilityIndex } from '../modules/availability/domain/availabilityIndex';
import { CertificationGate } from '../modules/certification/application/certificationGate';
import { ResourceRegistry } from '../modules/registry/application/resourceRegistry';
import type { CertificationRepository } from '../repository/ICertificationRepository';
import type { ReservationRepository } from '../repository/IReservationRepository';
import type { ResourceRepository } from '../repository/IResourceRepository';
import { InMemoryCertificationRepository } from '../repository/InMemoryCertificationRepository';
import { InMemoryReservationRepository } from '../repository/InMemoryReservationRepository';
import { InMemoryResourceRepository } from '../repository/InMemoryResourceRepository';
import { PostgresCertificationRepository } from '../repository/PostgresCertificationRepository';
import { PostgresReservationRepository } from '../repository/PostgresReservationRepository';
import { PostgresResourceRepository } from '../repository/PostgresResourceRepository';
import { persist } from './persistence';
import { ResourceLockManager } from './resourceLock';
import { ReservationService } from './services/reservationService';

export interface SchedulingRepositories {
  resources: ResourceRepository;
  certifications: CertificationRepository;
  reservations: ReservationRepository;
}

export interface SchedulingCoreOptions {
  repositories?: SchedulingRepositories;
  eventBus?: IEventBus;
  lockTimeoutMs?: number;
  clock?: () => Date;
}

export function buildRepositories(appConfig: AppConfig = config): SchedulingRepositories {
  if (appConfig.STORAGE_DRIVER === 'postgres') {
    return {
      resources: new PostgresResourceRepository(),
      certifications: new PostgresCertificationRepository(),
      reservations: new PostgresReservationRepository()
    };
  }

  return {
    resources: new InMemoryResourceRepository(),
    certifications: new InMemoryCertificationRepository(),
    reservations: new InMemoryReservationRepository()
  };
}

/**
 * Process-wide scheduling state. Nothing is served until `init()` has loaded
 * the registry and the certification gate and rebuilt the availability index
 * from the reservation store.
 */
export class SchedulingCore {
  readonly registry: ResourceRegistry;
  readonly gate: CertificationGate;
  readonly index: AvailabilityIndex;
  readonly locks: ResourceLockManager;
  readonly reservations: ReservationService;
  readonly availability: AvailabilityService;

  private readonly repositories: SchedulingRepositories;
  private readonly eventBus: IEventBus;
  private initialized = false;

  constructor(options: SchedulingCoreOptions = {}) {
    const clock = options.clock ?? (() => new Date());
    this.repositories = options.repositories ?? buildRepositories();
    this.eventBus = options.eventBus ?? getEventBus();

    this.locks = new ResourceLockManager(options.lockTimeoutMs ?? config.LOCK_TIMEOUT_MS);
    this.registry = new ResourceRegistry(this.repositories.resources, clock, this.locks);
    this.gate = new CertificationGate(this.registry, this.repositories.certifications, clock);
    this.index = new AvailabilityIndex();
    this.reservations = new ReservationService({
      registry: this.registry,
      gate: this.gate,
      index: this.index,
      repository: this.repositories.reservations,
      locks: this.locks,
      eventBus: this.eventBus,
      clock
    });
    this.availability = new AvailabilityService(this.registry, this.gate, this.index, clock);
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.registry.load();
    await this.gate.load();
    await this.rebuildIndex();
    this.initialized = true;
  }

  /** Re-derives the index from the reservation store. */
  async rebuildIndex(): Promise<void> {
    const active = await persist('reservations.findActive', () =>
      this.repositories.reservations.findActive()
    );
    this.index.rebuild(active);
    logger.info({ reservations: active.length }, 'Availability index rebuilt');
  }

  async shutdown(): Promise<void> {
    this.index.clear();
    this.initialized = false;
    await this.eventBus.close?.();
    logger.info('Scheduling core stopped');
  }
}

export function createSchedulingCore(options: SchedulingCoreOptions = {}): SchedulingCore {
  return new SchedulingCore(options);
}
