import { Router } from 'express';

import { availabilityQuerySchema, resourceParamsSchema } from '../../../dtos';
import { optionalRequester } from '../../../infrastructure/http/requesterIdentity';
import type { AvailabilityService } from '../application/availabilityService';

export function createAvailabilityRouter(service: AvailabilityService): Router {
  const router = Router();

  router.get('/resources/:id/availability', optionalRequester, (req, res, next) => {
    try {
      const params = resourceParamsSchema.parse(req.params);
      const query = availabilityQuerySchema.parse(req.query);

      const report = service.checkAvailability({
        resourceId: params.id,
        slot: { start: query.start, end: query.end },
        requesterId: res.locals.requesterId
      });
      res.status(200).json(report);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
