import type { ResourceId } from './resource';

export type UserId = string;

export interface Certification {
  userId: UserId;
  machineId: ResourceId;
  grantedAt: Date;
  expiresAt: Date | null;
}

export function isCertificationActive(certification: Certification, at: Date): boolean {
  return certification.expiresAt === null || certification.expiresAt.getTime() > at.getTime();
}

export function certificationKey(userId: UserId, machineId: ResourceId): string {
  return JSON.stringify([userId, machineId]);
}

export type CertificationDatabaseRow = {
  user_id: string;
  machine_id: string;
  granted_at: string | Date;
  expires_at: string | Date | null;
};
