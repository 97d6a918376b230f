import { getDb } from '@makerspace/shared';
import type { Pool } from 'pg';

import type {
  Certification,
  CertificationDatabaseRow,
  UserId
} from '../domain/certification';
import type { ResourceId } from '../domain/resource';
import type { CertificationRepository } from './ICertificationRepository';

function mapCertificationRow(row: CertificationDatabaseRow): Certification {
  return {
    userId: row.user_id,
    machineId: row.machine_id,
    grantedAt: new Date(row.granted_at),
    expiresAt: row.expires_at === null ? null : new Date(row.expires_at)
  };
}

export class PostgresCertificationRepository implements CertificationRepository {
  constructor(private readonly db: Pick<Pool, 'query'> = getDb()) {}

  async upsert(certification: Certification): Promise<void> {
    await this.db.query(
      `INSERT INTO certifications (user_id, machine_id, granted_at, expires_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (user_id, machine_id)
       DO UPDATE SET granted_at = EXCLUDED.granted_at, expires_at = EXCLUDED.expires_at`,
      [
        certification.userId,
        certification.machineId,
        certification.grantedAt.toISOString(),
        certification.expiresAt?.toISOString() ?? null
      ]
    );
  }

  async delete(userId: UserId, machineId: ResourceId): Promise<boolean> {
    const result = await this.db.query(
      'DELETE FROM certifications WHERE user_id = $1 AND machine_id = $2',
      [userId, machineId]
    );
    return Boolean(result.rowCount);
  }

  async findAll(): Promise<Certification[]> {
    const { rows } = await this.db.query<CertificationDatabaseRow>(
      'SELECT user_id, machine_id, granted_at, expires_at FROM certifications'
    );
    return rows.map(mapCertificationRow);
  }
}
