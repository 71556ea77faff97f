import { Router } from 'express';
import { z } from 'zod';
import type { HubContext } from '../services/context';
import { discoverDevices } from '../services/discovery';
import { checkAllDevices, checkDevice } from '../services/heartbeat';
import { requestAllData, requestShelfData, requestSystemStatus } from '../services/shelfControl';
import { ApiError, handle } from './apiError';

const UpdateDeviceSchema = z
  .object({
    deviceName: z.string().trim().min(1).optional(),
    location: z.string().trim().nullable().optional(),
  })
  .strict();

const NewDeviceSchema = z.object({
  deviceId: z.string().trim().min(1),
  deviceName: z.string().trim().min(1),
  location: z.string().trim().nullable().optional(),
  fromDiscovery: z.boolean().optional(),
});

const DeviceCommandSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('status') }),
  z.object({ command: z.literal('data') }),
  z.object({ command: z.literal('shelf'), shelfId: z.string().trim().min(1) }),
]);

export function createDevicesRouter(ctx: HubContext): Router {
  const router = Router();
  const { store } = ctx;

  const requireDevice = (deviceId: string) => {
    const device = store.getDevice(deviceId);
    if (!device) {
      throw new ApiError(404, 'DEVICE_NOT_FOUND', `Device ${deviceId} not found`);
    }
    return device;
  };

  router.get('/', handle((_req, res) => res.json(store.listDevices())));

  router.post(
    '/',
    handle((req, res) => {
      const input = NewDeviceSchema.parse(req.body);
      return res.status(201).json(store.addDevice(input));
    }),
  );

  router.get(
    '/unassigned',
    handle((_req, res) => {
      const devices = store.listUnassignedDevices();
      return res.json({ count: devices.length, devices });
    }),
  );

  router.get(
    '/discover',
    handle(async (_req, res) => {
      const devices = await discoverDevices(ctx);
      return res.json({ count: devices.length, devices });
    }),
  );

  router.get(
    '/heartbeat/all',
    handle(async (_req, res) => {
      const devices = await checkAllDevices(ctx);
      return res.json({ devices });
    }),
  );

  router.get('/:id', handle((req, res) => res.json(requireDevice(req.params.id))));

  router.patch(
    '/:id',
    handle((req, res) => {
      const fields = UpdateDeviceSchema.parse(req.body);
      requireDevice(req.params.id);
      store.updateDevice(req.params.id, fields);
      return res.json(requireDevice(req.params.id));
    }),
  );

  router.delete(
    '/:id',
    handle((req, res) => {
      if (!store.deleteDevice(req.params.id)) {
        throw new ApiError(404, 'DEVICE_NOT_FOUND', `Device ${req.params.id} not found`);
      }
      return res.json({ success: true });
    }),
  );

  router.get(
    '/:id/heartbeat',
    handle(async (req, res) => {
      requireDevice(req.params.id);
      const result = await checkDevice(ctx, req.params.id);
      return res.json({ deviceId: req.params.id, ...result });
    }),
  );

  router.post(
    '/:id/commands',
    handle(async (req, res) => {
      const body = DeviceCommandSchema.parse(req.body);
      const deviceId = requireDevice(req.params.id).deviceId;

      let sent: boolean;
      if (body.command === 'shelf') {
        const shelf = store.getShelf(body.shelfId);
        if (!shelf || shelf.deviceId !== deviceId) {
          throw new ApiError(404, 'SHELF_NOT_FOUND', `Shelf ${body.shelfId} not found on ${deviceId}`);
        }
        sent = await requestShelfData(ctx, shelf.shelfId, deviceId);
      } else if (body.command === 'status') {
        sent = await requestSystemStatus(ctx, deviceId);
      } else {
        sent = await requestAllData(ctx, deviceId);
      }

      if (!sent) {
        throw new ApiError(502, 'PUBLISH_FAILED', `Could not send "${body.command}" to the broker`);
      }
      return res.status(202).json({ success: true, ...body });
    }),
  );

  return router;
}
