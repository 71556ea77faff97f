import { Router } from 'express';
import { z } from 'zod';
import type { HubContext } from '../services/context';
import { queryShelfConfig } from '../services/shelfConfig';
import { calibrateShelf, setShelfEnabled } from '../services/shelfControl';
import { ApiError, handle } from './apiError';

const NewShelfSchema = z.object({
  shelfId: z.string().trim().min(1),
  deviceId: z.string().trim().min(1),
  maxDistance: z.number().positive(),
  productId: z.string().trim().min(1).nullable().optional(),
  stockQuantity: z.number().int().nonnegative().optional(),
  positionIndex: z.number().int().nonnegative().optional(),
});

const StockUpdateSchema = z.object({
  stockQuantity: z.number().int().nonnegative(),
});

export function createShelvesRouter(ctx: HubContext): Router {
  const router = Router();
  const { store } = ctx;

  const requireShelf = (shelfId: string) => {
    const shelf = store.getShelf(shelfId);
    if (!shelf) {
      throw new ApiError(404, 'SHELF_NOT_FOUND', `Shelf ${shelfId} not found`);
    }
    return shelf;
  };

  router.get(
    '/',
    handle((req, res) => {
      const deviceId = typeof req.query.device_id === 'string' ? req.query.device_id : undefined;
      return res.json(store.listShelves(deviceId));
    }),
  );

  router.post(
    '/',
    handle((req, res) => {
      const input = NewShelfSchema.parse(req.body);
      return res.status(201).json(store.addShelf(input));
    }),
  );

  router.get(
    '/config/:deviceId',
    handle(async (req, res) => {
      const config = await queryShelfConfig(ctx, req.params.deviceId);
      if (!config) {
        throw new ApiError(404, 'DEVICE_UNREACHABLE', `No shelf config from ${req.params.deviceId}; the device may be offline`);
      }
      const synced = store.applyDeviceShelfConfig(config.device_id, config.shelves);
      return res.json({ config, synced });
    }),
  );

  router.get(
    '/available/:location',
    handle((req, res) => {
      const shelves = store.listAvailableShelves(req.params.location);
      return res.json({ count: shelves.length, shelves });
    }),
  );

  router.get('/:id', handle((req, res) => res.json(requireShelf(req.params.id))));

  router.delete(
    '/:id',
    handle((req, res) => {
      if (!store.deleteShelf(req.params.id)) {
        throw new ApiError(404, 'SHELF_NOT_FOUND', `Shelf ${req.params.id} not found`);
      }
      return res.json({ success: true });
    }),
  );

  router.get(
    '/:id/stock-changes',
    handle((req, res) => {
      requireShelf(req.params.id);
      return res.json(store.listStockChanges(req.params.id));
    }),
  );

  router.post(
    '/:id/stock',
    handle((req, res) => {
      const { stockQuantity } = StockUpdateSchema.parse(req.body);
      if (!store.updateStockQuantity(req.params.id, stockQuantity)) {
        throw new ApiError(404, 'SHELF_NOT_FOUND', `Shelf ${req.params.id} not found`);
      }
      return res.json(requireShelf(req.params.id));
    }),
  );

  const toggle = (enabled: boolean) =>
    handle(async (req, res) => {
      requireShelf(req.params.id);
      if (!(await setShelfEnabled(ctx, req.params.id, enabled))) {
        throw new ApiError(502, 'PUBLISH_FAILED', `Could not send ${enabled ? 'enable' : 'disable'} for ${req.params.id}`);
      }
      return res.json(requireShelf(req.params.id));
    });

  router.post('/:id/enable', toggle(true));
  router.post('/:id/disable', toggle(false));

  router.post(
    '/:id/calibrate',
    handle(async (req, res) => {
      const shelf = requireShelf(req.params.id);
      if (!(await calibrateShelf(ctx, shelf.shelfId, shelf.deviceId))) {
        throw new ApiError(502, 'PUBLISH_FAILED', `Could not send calibrate for ${shelf.shelfId}`);
      }
      return res.status(202).json({ success: true, shelfId: shelf.shelfId });
    }),
  );

  return router;
}
