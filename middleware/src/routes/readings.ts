import { Router } from 'express';
import { z } from 'zod';
import { isValidDistance } from '../services/analyzer';
import type { HubContext } from '../services/context';
import { ApiError, handle } from './apiError';

const SensorQuerySchema = z.object({
  device_id: z.string().min(1).optional(),
  shelf_id: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(1000).default(50),
});

const AnalyzeSchema = z.object({
  shelfId: z.string().trim().min(1),
  distanceCm: z.number(),
});

export function createReadingsRouter({ store, analyzer }: Pick<HubContext, 'store' | 'analyzer'>): Router {
  const router = Router();

  router.get('/stats', handle((_req, res) => res.json(store.stats())));

  router.get(
    '/sensor-data',
    handle((req, res) => {
      const query = SensorQuerySchema.parse(req.query);
      const data = store.querySensorData({ deviceId: query.device_id, shelfId: query.shelf_id, limit: query.limit });
      return res.json({ data, sources: store.distinctSensorSources() });
    }),
  );

  router.post(
    '/analyze',
    handle((req, res) => {
      const { shelfId, distanceCm } = AnalyzeSchema.parse(req.body);
      if (!isValidDistance(distanceCm)) {
        throw new ApiError(400, 'INVALID_DISTANCE', `Distance ${distanceCm} cm is not a valid reading`);
      }

      const { geometry, occupied, fillPercent, estimatedCount } = analyzer.assess(shelfId, distanceCm);
      return res.json({ shelfId, distanceCm, geometry, occupied, fillPercent, estimatedCount });
    }),
  );

  return router;
}
