import { ValidationError, logger } from '@makerspace/shared';

import { persist } from '../../../application/persistence';
import {
  certificationKey,
  isCertificationActive,
  type Certification,
  type UserId
} from '../../../domain/certification';
import { requiresCertification, type ResourceId } from '../../../domain/resource';
import type { CertificationRepository } from '../../../repository/ICertificationRepository';
import type { ResourceRegistry } from '../../registry/application/resourceRegistry';

export interface GrantOptions {
  /** `null` grants without expiry. Omitted, an active grant is left as it is. */
  expiresAt?: Date | null;
}

export class CertificationGate {
  private readonly certifications = new Map<string, Readonly<Certification>>();

  constructor(
    private readonly registry: ResourceRegistry,
    private readonly repository: CertificationRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async load(): Promise<void> {
    const stored = await persist('certifications.findAll', () => this.repository.findAll());
    this.certifications.clear();
    for (const certification of stored) {
      this.certifications.set(
        certificationKey(certification.userId, certification.machineId),
        Object.freeze({ ...certification })
      );
    }
    logger.info({ certifications: stored.length }, 'Certification gate loaded');
  }

  /**
   * Idempotent. Granting an active certification again is a no-op unless a
   * different expiry is supplied, in which case the grant is refreshed.
   */
  async grant(
    userId: UserId,
    machineId: ResourceId,
    options: GrantOptions = {}
  ): Promise<Readonly<Certification>> {
    const machine = this.registry.get(machineId);
    if (machine.kind !== 'machine') {
      throw new ValidationError('Certifications apply to machines only', {
        resourceId: machineId,
        kind: machine.kind
      });
    }

    const key = certificationKey(userId, machineId);
    const now = this.clock();
    const existing = this.certifications.get(key);

    if (
      existing &&
      isCertificationActive(existing, now) &&
      (options.expiresAt === undefined || sameInstant(existing.expiresAt, options.expiresAt))
    ) {
      return existing;
    }

    const certification: Certification = {
      userId,
      machineId,
      grantedAt: now,
      expiresAt: options.expiresAt ?? null
    };

    await persist('certifications.upsert', () => this.repository.upsert(certification), {
      userId,
      machineId
    });
    const frozen = Object.freeze(certification);
    this.certifications.set(key, frozen);

    logger.info({ userId, machineId, expiresAt: certification.expiresAt }, 'Certification granted');
    return frozen;
  }

  /** Leaves confirmed reservations in place. Returns whether a grant existed. */
  async revoke(userId: UserId, machineId: ResourceId): Promise<boolean> {
    const key = certificationKey(userId, machineId);
    if (!this.certifications.has(key)) {
      return false;
    }

    await persist('certifications.delete', () => this.repository.delete(userId, machineId), {
      userId,
      machineId
    });
    this.certifications.delete(key);

    logger.info({ userId, machineId }, 'Certification revoked');
    return true;
  }

  hasCertification(userId: UserId, machineId: ResourceId, at: Date = this.clock()): boolean {
    const certification = this.certifications.get(certificationKey(userId, machineId));
    return certification !== undefined && isCertificationActive(certification, at);
  }

  isAuthorized(userId: UserId, machineId: ResourceId, at: Date = this.clock()): boolean {
    const resource = this.registry.find(machineId);
    if (!resource) {
      return false;
    }

    if (!requiresCertification(resource)) {
      return true;
    }

    return this.hasCertification(userId, machineId, at);
  }

  /** Newest grant first. Expired grants are included. */
  listForUser(userId: UserId): Readonly<Certification>[] {
    return Array.from(this.certifications.values())
      .filter((certification) => certification.userId === userId)
      .sort(
        (a, b) =>
          b.grantedAt.getTime() - a.grantedAt.getTime() || a.machineId.localeCompare(b.machineId)
      );
  }
}

function sameInstant(a: Date | null, b: Date | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.getTime() === b.getTime();
}
