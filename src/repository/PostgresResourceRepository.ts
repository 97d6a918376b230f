import { DuplicateResourceError, NotFoundError, getDb } from '@makerspace/shared';
import type { Pool } from 'pg';

import { isResourceKind, type Resource, type ResourceDatabaseRow } from '../domain/resource';
import type { ResourceRepository } from './IResourceRepository';

const RESOURCE_COLUMNS = `
  id,
  kind,
  name,
  capacity,
  certification_required,
  created_at,
  updated_at
`;

const UNIQUE_VIOLATION = '23505';

function mapResourceRow(row: ResourceDatabaseRow): Resource {
  if (!isResourceKind(row.kind)) {
    throw new Error(`Unknown resource kind "${row.kind}" for resource ${row.id}`);
  }

  return {
    id: row.id,
    kind: row.kind,
    name: row.name,
    capacity: Number(row.capacity),
    certificationRequired: row.certification_required,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export class PostgresResourceRepository implements ResourceRepository {
  constructor(private readonly db: Pick<Pool, 'query'> = getDb()) {}

  async insert(resource: Resource): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO resources (${RESOURCE_COLUMNS}) VALUES ($1,$2,$3,$4,$5,$6,$7)`,
        [
          resource.id,
          resource.kind,
          resource.name,
          resource.capacity,
          resource.certificationRequired,
          resource.createdAt.toISOString(),
          resource.updatedAt.toISOString()
        ]
      );
    } catch (error) {
      if (hasErrorCode(error, UNIQUE_VIOLATION)) {
        throw new DuplicateResourceError('Resource already exists', { resourceId: resource.id });
      }
      throw error;
    }
  }

  async update(resource: Resource): Promise<void> {
    const result = await this.db.query(
      `UPDATE resources
          SET name = $2,
              capacity = $3,
              certification_required = $4,
              updated_at = $5
        WHERE id = $1`,
      [
        resource.id,
        resource.name,
        resource.capacity,
        resource.certificationRequired,
        resource.updatedAt.toISOString()
      ]
    );

    if (!result.rowCount) {
      throw new NotFoundError('Resource not found', { resourceId: resource.id });
    }
  }

  async findAll(): Promise<Resource[]> {
    const { rows } = await this.db.query<ResourceDatabaseRow>(
      `SELECT ${RESOURCE_COLUMNS} FROM resources ORDER BY id`
    );
    return rows.map(mapResourceRow);
  }
}
