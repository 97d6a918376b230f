import { certificationKey, type Certification, type UserId } from '../domain/certification';
import type { ResourceId } from '../domain/resource';
import type { CertificationRepository } from './ICertificationRepository';

export class InMemoryCertificationRepository implements CertificationRepository {
  private readonly rows = new Map<string, Certification>();

  async upsert(certification: Certification): Promise<void> {
    this.rows.set(certificationKey(certification.userId, certification.machineId), {
      ...certification
    });
  }

  async delete(userId: UserId, machineId: ResourceId): Promise<boolean> {
    return this.rows.delete(certificationKey(userId, machineId));
  }

  async findAll(): Promise<Certification[]> {
    return Array.from(this.rows.values(), (row) => ({ ...row }));
  }
}
