import type { Certification, UserId } from '../domain/certification';
import type { ResourceId } from '../domain/resource';

export interface CertificationRepository {
  upsert(certification: Certification): Promise<void>;
  delete(userId: UserId, machineId: ResourceId): Promise<boolean>;
  findAll(): Promise<Certification[]>;
}
