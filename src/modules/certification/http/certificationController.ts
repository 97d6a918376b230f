import { Router } from 'express';

import { runWithSpan } from '@makerspace/shared';

import type { Certification } from '../../../domain/certification';
import {
  certificationParamsSchema,
  grantCertificationBodySchema,
  userParamsSchema,
  type CertificationResource
} from '../../../dtos';
import type { CertificationGate } from '../application/certificationGate';

function toCertificationResource(certification: Readonly<Certification>): CertificationResource {
  return {
    userId: certification.userId,
    machineId: certification.machineId,
    grantedAt: certification.grantedAt.toISOString(),
    expiresAt: certification.expiresAt?.toISOString() ?? null
  };
}

export function createCertificationRouter(gate: CertificationGate): Router {
  const router = Router();

  router.put('/resources/:id/certifications/:userId', async (req, res, next) => {
    try {
      await runWithSpan('HTTP PUT /resources/:id/certifications/:userId', async () => {
        const params = certificationParamsSchema.parse(req.params);
        const body = grantCertificationBodySchema.parse(req.body ?? {});

        const certification = await gate.grant(params.userId, params.id, {
          expiresAt:
            body.expiresAt === undefined
              ? undefined
              : body.expiresAt === null
                ? null
                : new Date(body.expiresAt)
        });
        res.status(200).json(toCertificationResource(certification));
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/resources/:id/certifications/:userId', async (req, res, next) => {
    try {
      await runWithSpan('HTTP DELETE /resources/:id/certifications/:userId', async () => {
        const params = certificationParamsSchema.parse(req.params);

        const revoked = await gate.revoke(params.userId, params.id);
        if (!revoked) {
          res.status(404).json({ error: 'NotFoundError', message: 'Certification not found' });
          return;
        }
        res.status(204).send();
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/users/:userId/certifications', (req, res, next) => {
    try {
      const params = userParamsSchema.parse(req.params);
      res.status(200).json(gate.listForUser(params.userId).map(toCertificationResource));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
