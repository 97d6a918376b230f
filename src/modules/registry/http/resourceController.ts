import { Router } from 'express';

import { logger, runWithSpan } from '@makerspace/shared';

import type { Resource } from '../../../domain/resource';
import {
  listResourcesQuerySchema,
  registerResourceRequestSchema,
  resourceParamsSchema,
  updateResourceRequestSchema,
  type ResourceDescriptor
} from '../../../dtos';
import type { ResourceRegistry } from '../application/resourceRegistry';

export function toResourceDescriptor(resource: Readonly<Resource>): ResourceDescriptor {
  return {
    id: resource.id,
    kind: resource.kind,
    name: resource.name,
    capacity: resource.capacity,
    certificationRequired: resource.certificationRequired,
    createdAt: resource.createdAt.toISOString(),
    updatedAt: resource.updatedAt.toISOString()
  };
}

export function createResourceRouter(registry: ResourceRegistry): Router {
  const router = Router();

  router.post('/resources', async (req, res, next) => {
    try {
      await runWithSpan('HTTP POST /resources', async () => {
        const body = registerResourceRequestSchema.parse(req.body);
        (res.locals.logger ?? logger).info({ route: '/resources', body }, 'Registering resource');

        const id = await registry.register(body);
        res.status(201).json(toResourceDescriptor(registry.get(id)));
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/resources', (req, res, next) => {
    try {
      const query = listResourcesQuerySchema.parse(req.query);
      res.status(200).json(registry.list(query.kind).map(toResourceDescriptor));
    } catch (error) {
      next(error);
    }
  });

  router.get('/resources/:id', (req, res, next) => {
    try {
      const params = resourceParamsSchema.parse(req.params);
      res.status(200).json(toResourceDescriptor(registry.get(params.id)));
    } catch (error) {
      next(error);
    }
  });

  router.patch('/resources/:id', async (req, res, next) => {
    try {
      await runWithSpan('HTTP PATCH /resources/:id', async () => {
        const params = resourceParamsSchema.parse(req.params);
        const body = updateResourceRequestSchema.parse(req.body);

        let resource = registry.get(params.id);
        if (body.capacity !== undefined) {
          resource = await registry.updateCapacity(params.id, body.capacity);
        }
        if (body.certificationRequired !== undefined) {
          resource = await registry.setCertificationRequired(params.id, body.certificationRequired);
        }

        res.status(200).json(toResourceDescriptor(resource));
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
