export const RESOURCE_KINDS = ['machine', 'space', 'trainer'] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export type ResourceId = string;

export interface Resource {
  id: ResourceId;
  kind: ResourceKind;
  name: string;
  /** Simultaneous confirmed reservations tolerated; 1 for exclusive use. */
  capacity: number;
  /** Only consulted for machines. */
  certificationRequired: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface RegisterResourceInput {
  id: ResourceId;
  kind: ResourceKind;
  name?: string;
  capacity?: number;
  certificationRequired?: boolean;
}

export function requiresCertification(resource: Resource): boolean {
  return resource.kind === 'machine' && resource.certificationRequired;
}

export type ResourceDatabaseRow = {
  id: string;
  kind: string;
  name: string;
  capacity: number;
  certification_required: boolean;
  created_at: string | Date;
  updated_at: string | Date;
};

export function isResourceKind(value: string): value is ResourceKind {
  return RESOURCE_KINDS.some((kind) => kind === value);
}
