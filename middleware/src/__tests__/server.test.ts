import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { Server } from 'node:http';
import type { HubContext } from '../services/context';
import { createServer } from '../server';
import { SimulatedShelfDevice } from '../../../test_client/src/device';
import { createTestContext, FakeBus, T0 } from './helpers';

type Reply = { status: number; body: unknown };

const field = (value: unknown, key: string): unknown => {
  assert.ok(typeof value === 'object' && value !== null, `expected an object, got ${JSON.stringify(value)}`);
  return Object.getOwnPropertyDescriptor(value, key)?.value;
};

describe('console API', () => {
  let ctx: HubContext & { bus: FakeBus };
  let server: Server;
  let baseUrl = '';

  const call = async (method: string, path: string, body?: object | string): Promise<Reply> => {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'content-type': 'application/json' },
      body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  };

  beforeEach(async () => {
    ctx = createTestContext();
    ctx.store.seedDefaults('CTRL_001', 'Shelf controller 1', 'Warehouse A');

    server = createServer(ctx).listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    assert.ok(address !== null && typeof address === 'object');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    ctx.store.close();
  });

  it('answers the health check', async () => {
    assert.deepEqual(await call('GET', '/health'), { status: 200, body: { ok: true } });
  });

  it('returns 404 for unknown routes', async () => {
    assert.deepEqual(await call('GET', '/api/nope'), {
      status: 404,
      body: { error: { code: 'NOT_FOUND', message: 'Route not found' } },
    });
  });

  describe('devices', () => {
    it('lists devices with their shelf counts', async () => {
      const { status, body } = await call('GET', '/api/devices');
      assert.equal(status, 200);
      assert.deepEqual(body, [
        {
          deviceId: 'CTRL_001',
          deviceName: 'Shelf controller 1',
          location: 'Warehouse A',
          status: 'online',
          lastSeen: T0,
          createdAt: T0,
          shelfCount: 3,
        },
      ]);
    });

    it('registers a device from the console as offline', async () => {
      const reply = await call('POST', '/api/devices', { deviceId: 'CTRL_009', deviceName: 'Cold room', location: 'Store B' });
      assert.deepEqual(reply, {
        status: 201,
        body: {
          deviceId: 'CTRL_009',
          deviceName: 'Cold room',
          location: 'Store B',
          status: 'offline',
          lastSeen: T0,
          createdAt: T0,
        },
      });
      assert.equal(ctx.store.getDevice('CTRL_009')?.status, 'offline');
    });

    it('registers a discovered device as online', async () => {
      const { status, body } = await call('POST', '/api/devices', {
        deviceId: 'CTRL_SIM',
        deviceName: 'Simulated CTRL_SIM',
        fromDiscovery: true,
      });
      assert.equal(status, 201);
      assert.equal(field(body, 'status'), 'online');
      assert.equal(field(body, 'location'), null);
    });

    it('returns 409 for a device id that is taken', async () => {
      assert.deepEqual(await call('POST', '/api/devices', { deviceId: 'CTRL_001', deviceName: 'Again' }), {
        status: 409,
        body: { error: { code: 'CONFLICT', message: 'Device CTRL_001 already exists' } },
      });
    });

    it('rejects a device without a name', async () => {
      const { status, body } = await call('POST', '/api/devices', { deviceId: 'CTRL_010' });
      assert.equal(status, 400);
      assert.equal(field(field(body, 'error'), 'code'), 'VALIDATION_ERROR');
    });

    it('renames a device', async () => {
      const { status, body } = await call('PATCH', '/api/devices/CTRL_001', { deviceName: 'Aisle 3' });
      assert.equal(status, 200);
      assert.equal(field(body, 'deviceName'), 'Aisle 3');
      assert.equal(field(body, 'location'), 'Warehouse A');
    });

    it('rejects unknown fields on update', async () => {
      const { status, body } = await call('PATCH', '/api/devices/CTRL_001', { status: 'online' });
      assert.equal(status, 400);
      assert.equal(field(field(body, 'error'), 'code'), 'VALIDATION_ERROR');
    });

    it('returns 404 for an unknown device', async () => {
      assert.deepEqual(await call('GET', '/api/devices/CTRL_404'), {
        status: 404,
        body: { error: { code: 'DEVICE_NOT_FOUND', message: 'Device CTRL_404 not found' } },
      });
    });

    it('lists unassigned devices', async () => {
      ctx.store.registerDevice('CTRL_NEW');
      const { body } = await call('GET', '/api/devices/unassigned');
      assert.equal(field(body, 'count'), 1);
    });

    it('forwards a status command to the broker', async () => {
      const reply = await call('POST', '/api/devices/CTRL_001/commands', { command: 'status' });
      assert.deepEqual(reply, { status: 202, body: { success: true, command: 'status' } });
      assert.deepEqual(ctx.bus.published, [{ topic: 'shelf/command', payload: 'status' }]);
    });

    it('requests a reading from one shelf of the device', async () => {
      assert.deepEqual(await call('POST', '/api/devices/CTRL_001/commands', { command: 'shelf', shelfId: 'A1' }), {
        status: 202,
        body: { success: true, command: 'shelf', shelfId: 'A1' },
      });
      assert.deepEqual(ctx.bus.published, [{ topic: 'shelf/command', payload: 'shelf A1' }]);
    });

    it('refuses a shelf reading for a shelf the device does not own', async () => {
      ctx.store.registerDevice('CTRL_002');
      ctx.store.addShelf({ shelfId: 'C1', deviceId: 'CTRL_002', maxDistance: 40 });
      const { status, body } = await call('POST', '/api/devices/CTRL_001/commands', { command: 'shelf', shelfId: 'C1' });
      assert.equal(status, 404);
      assert.equal(field(field(body, 'error'), 'code'), 'SHELF_NOT_FOUND');
      assert.deepEqual(ctx.bus.published, []);
    });

    it('requires a shelf id for a shelf reading', async () => {
      assert.equal((await call('POST', '/api/devices/CTRL_001/commands', { command: 'shelf' })).status, 400);
    });

    it('reports a command the broker did not take', async () => {
      ctx.bus.online = false;
      const { status, body } = await call('POST', '/api/devices/CTRL_001/commands', { command: 'data' });
      assert.equal(status, 502);
      assert.equal(field(field(body, 'error'), 'code'), 'PUBLISH_FAILED');
    });

    it('reports heartbeat results for every device', async () => {
      const device = new SimulatedShelfDevice('CTRL_001', [], (topic, payload) => ctx.bus.emit(topic, payload));
      ctx.bus.responder = (topic, payload) => device.handle(topic, payload);

      assert.deepEqual(await call('GET', '/api/devices/heartbeat/all'), {
        status: 200,
        body: { devices: { CTRL_001: { online: true, lastSeen: T0 } } },
      });
    });
  });

  describe('products', () => {
    it('creates a product bound to a shelf', async () => {
      const { status, body } = await call('POST', '/api/products', {
        productId: 'P-100',
        productName: 'Tissue box',
        productLength: 5,
        shelfId: 'A1',
        stockQuantity: 3,
      });
      assert.equal(status, 201);
      assert.equal(field(body, 'productId'), 'P-100');
      assert.equal(ctx.store.getShelf('A1')?.productName, 'Tissue box');

      const summary = await call('GET', '/api/products/summary');
      assert.deepEqual(summary.body, [
        { productId: 'P-100', productName: 'Tissue box', productLength: 5, shelfCount: 1, totalStock: 3 },
      ]);
    });

    it('returns 409 for a duplicate product', async () => {
      ctx.store.addProduct({ productId: 'P-100', productName: 'Tissue box', productLength: 5 });
      const { status, body } = await call('POST', '/api/products', {
        productId: 'P-100',
        productName: 'Again',
        productLength: 2,
      });
      assert.equal(status, 409);
      assert.deepEqual(body, { error: { code: 'CONFLICT', message: 'Product P-100 already exists' } });
    });

    it('returns 404 when binding to a missing shelf', async () => {
      const { status, body } = await call('POST', '/api/products', {
        productId: 'P-200',
        productName: 'Soap',
        productLength: 4,
        shelfId: 'Z9',
      });
      assert.equal(status, 404);
      assert.deepEqual(body, { error: { code: 'NOT_FOUND', message: 'Shelf Z9 not found' } });
    });

    it('rejects a body that is not JSON', async () => {
      const { status, body } = await call('POST', '/api/products', '{"productId":');
      assert.equal(status, 400);
      assert.equal(field(field(body, 'error'), 'code'), 'INVALID_JSON');
    });

    it('returns 404 when deleting an unknown product', async () => {
      assert.equal((await call('DELETE', '/api/products/P-404')).status, 404);
    });
  });

  describe('shelves', () => {
    it('filters shelves by device', async () => {
      ctx.store.registerDevice('CTRL_002');
      ctx.store.addShelf({ shelfId: 'C1', deviceId: 'CTRL_002', maxDistance: 40 });
      const { body } = await call('GET', '/api/shelves?device_id=CTRL_002');
      assert.ok(Array.isArray(body));
      assert.deepEqual(
        body.map((shelf) => field(shelf, 'shelfId')),
        ['C1'],
      );
    });

    it('updates the stock quantity', async () => {
      const { status, body } = await call('POST', '/api/shelves/A2/stock', { stockQuantity: 9 });
      assert.equal(status, 200);
      assert.equal(field(body, 'stockQuantity'), 9);
    });

    it('lists the stock history of a shelf', async () => {
      ctx.store.addProduct({ productId: 'P-100', productName: 'Tissue box', productLength: 5, shelfId: 'A1', stockQuantity: 4 });
      await call('POST', '/api/shelves/A1/stock', { stockQuantity: 1 });

      assert.deepEqual(await call('GET', '/api/shelves/A1/stock-changes'), {
        status: 200,
        body: [{ productId: 'P-100', changeType: 'manual', quantityBefore: 4, quantityAfter: 1, timestamp: T0 }],
      });
    });

    it('returns 404 for the stock history of an unknown shelf', async () => {
      assert.equal((await call('GET', '/api/shelves/Z9/stock-changes')).status, 404);
    });

    it('rejects a negative stock quantity', async () => {
      assert.equal((await call('POST', '/api/shelves/A2/stock', { stockQuantity: -1 })).status, 400);
    });

    it('disables a shelf through the controller command', async () => {
      const { status, body } = await call('POST', '/api/shelves/B1/disable');
      assert.equal(status, 200);
      assert.equal(field(body, 'enabled'), false);
      assert.deepEqual(ctx.bus.published, [{ topic: 'shelf/command', payload: 'disable B1' }]);
    });

    it('accepts a calibration request', async () => {
      assert.deepEqual(await call('POST', '/api/shelves/A1/calibrate'), {
        status: 202,
        body: { success: true, shelfId: 'A1' },
      });
      assert.deepEqual(ctx.bus.published, [{ topic: 'shelf/command', payload: 'calibrate A1' }]);
    });

    it('returns 404 for an unknown shelf', async () => {
      assert.deepEqual(await call('POST', '/api/shelves/Z9/enable'), {
        status: 404,
        body: { error: { code: 'SHELF_NOT_FOUND', message: 'Shelf Z9 not found' } },
      });
      assert.deepEqual(ctx.bus.published, []);
    });

    it('reports an unreachable controller when querying its config', async () => {
      const { status, body } = await call('GET', '/api/shelves/config/CTRL_001');
      assert.equal(status, 404);
      assert.equal(field(field(body, 'error'), 'code'), 'DEVICE_UNREACHABLE');
    });

    it('syncs the config a controller reports', async () => {
      const device = new SimulatedShelfDevice(
        'CTRL_001',
        [{ shelfId: 'A1', gpio: 13, shelfLength: 27, distanceCm: 10, enabled: false, sensorConnected: true }],
        (topic, payload) => ctx.bus.emit(topic, payload),
      );
      ctx.bus.responder = (topic, payload) => device.handle(topic, payload);

      const { status, body } = await call('GET', '/api/shelves/config/CTRL_001');
      assert.equal(status, 200);
      assert.equal(field(body, 'synced'), 1);
      assert.equal(ctx.store.getShelf('A1')?.enabled, false);
      assert.equal(ctx.store.getShelf('A1')?.shelfLength, 27);
    });

    it('lists empty shelves at a location', async () => {
      const { body } = await call('GET', `/api/shelves/available/${encodeURIComponent('Warehouse A')}`);
      assert.equal(field(body, 'count'), 3);
    });
  });

  describe('readings', () => {
    it('analyzes a reading against the shelf geometry', async () => {
      ctx.store.addProduct({ productId: 'P-100', productName: 'Tissue box', productLength: 5, shelfId: 'A1' });

      const { status, body } = await call('POST', '/api/analyze', { shelfId: 'A1', distanceCm: 0 });
      assert.equal(status, 200);
      assert.deepEqual(body, {
        shelfId: 'A1',
        distanceCm: 0,
        geometry: { maxDistance: 30, productLength: 5 },
        occupied: true,
        fillPercent: 100,
        estimatedCount: 6,
      });
    });

    it('analyzes an unknown shelf as empty', async () => {
      const { body } = await call('POST', '/api/analyze', { shelfId: 'Z9', distanceCm: 4 });
      assert.deepEqual(body, {
        shelfId: 'Z9',
        distanceCm: 4,
        geometry: null,
        occupied: false,
        fillPercent: 0,
        estimatedCount: null,
      });
    });

    it('rejects a sensor fault reading', async () => {
      assert.deepEqual(await call('POST', '/api/analyze', { shelfId: 'A1', distanceCm: -1 }), {
        status: 400,
        body: { error: { code: 'INVALID_DISTANCE', message: 'Distance -1 cm is not a valid reading' } },
      });
    });

    it('filters stored readings', async () => {
      ctx.store.saveSensorData('CTRL_001', 'A1', 25, true, 16.7);
      ctx.store.saveSensorData('CTRL_001', 'B1', 20, false, 0);

      const { status, body } = await call('GET', '/api/sensor-data?shelf_id=B1&limit=5');
      assert.equal(status, 200);
      const data = field(body, 'data');
      assert.ok(Array.isArray(data));
      assert.deepEqual(
        data.map((row) => field(row, 'shelfId')),
        ['B1'],
      );
      assert.deepEqual(field(body, 'sources'), { devices: ['CTRL_001'], shelves: ['A1', 'B1'] });
    });

    it('rejects an oversized limit', async () => {
      assert.equal((await call('GET', '/api/sensor-data?limit=5000')).status, 400);
    });

    it('reports store statistics', async () => {
      const { body } = await call('GET', '/api/stats');
      assert.equal(field(body, 'shelfCount'), 3);
      assert.equal(field(body, 'occupancyRate'), 0);
    });
  });
});
