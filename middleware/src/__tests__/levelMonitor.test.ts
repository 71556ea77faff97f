import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_SHELVES } from '../config';
import { createAnalyzer } from '../services/analyzer';
import type { ShelfStore } from '../services/database';
import { createLevelMonitor } from '../services/levelMonitor';
import { createGeometryResolver } from '../services/shelfGeometry';
import { createTestStore, json, RecordingMirror } from './helpers';

describe('createLevelMonitor', () => {
  let store: ShelfStore;
  let mirror: RecordingMirror;
  let handle: ReturnType<typeof createLevelMonitor>;

  beforeEach(() => {
    store = createTestStore();
    store.seedDefaults('CTRL_001', 'Shelf controller 1', 'Warehouse A');
    mirror = new RecordingMirror();
    const analyzer = createAnalyzer(createGeometryResolver(store, { ...DEFAULT_SHELVES }), 2.0);
    handle = createLevelMonitor({ store, analyzer, mirror });
  });

  it('stores an analyzed reading and mirrors it', async () => {
    assert.equal(await handle(json({ device_id: 'CTRL_001', shelf_id: 'A1', distance_cm: 0 })), 'stored');

    const [record] = store.querySensorData();
    assert.deepEqual([record.deviceId, record.shelfId, record.distanceCm, record.occupied, record.fillPercent], [
      'CTRL_001',
      'A1',
      0,
      true,
      100,
    ]);
    assert.deepEqual(mirror.levels, [
      ['A1', { deviceId: 'CTRL_001', distanceCm: 0, occupied: true, fillPercent: 100, estimatedCount: null }],
    ]);
  });

  it('estimates a unit count once a product is bound', async () => {
    store.addProduct({ productId: 'P-100', productName: 'Tissue box', productLength: 5, shelfId: 'A1', stockQuantity: 2 });

    await handle(json({ device_id: 'CTRL_001', shelf_id: 'A1', distance_cm: 20 }));
    await handle(json({ device_id: 'CTRL_001', shelf_id: 'A1', distance_cm: 26 }));

    assert.deepEqual(
      mirror.levels.map(([, level]) => [level.occupied, level.estimatedCount]),
      [
        [true, 2],
        [false, 0],
      ],
    );
  });

  it('stores a reading for an unknown shelf as empty', async () => {
    assert.equal(await handle(json({ device_id: 'CTRL_001', shelf_id: 'Z9', distance_cm: 3 })), 'stored');
    const [record] = store.querySensorData();
    assert.deepEqual([record.shelfId, record.occupied, record.fillPercent], ['Z9', false, 0]);
  });

  it('ignores sensor faults without storing them', async () => {
    assert.equal(await handle(json({ device_id: 'CTRL_001', shelf_id: 'A1', distance_cm: -1 })), 'invalid');
    assert.equal(await handle(json({ device_id: 'CTRL_001', shelf_id: 'A1' })), 'invalid');
    assert.deepEqual(store.querySensorData(), []);
    assert.deepEqual(mirror.levels, []);
  });

  it('drops malformed messages', async () => {
    assert.equal(await handle(Buffer.from('A1=12cm')), 'malformed');
    assert.equal(await handle(json({ device_id: 'CTRL_001', distance_cm: 12 })), 'malformed');
    assert.deepEqual(store.querySensorData(), []);
  });

  it('keeps the reading when the mirror fails', async () => {
    mirror.failing = true;
    assert.equal(await handle(json({ device_id: 'CTRL_001', shelf_id: 'A2', distance_cm: 10 })), 'stored');
    assert.equal(store.querySensorData().length, 1);
  });

  it('resolves the shelf geometry once per reading', async () => {
    const resolver = createGeometryResolver(store, { ...DEFAULT_SHELVES });
    let lookups = 0;
    const counted = createLevelMonitor({
      store,
      analyzer: createAnalyzer(
        {
          resolve: (shelfId) => {
            lookups++;
            return resolver.resolve(shelfId);
          },
        },
        2.0,
      ),
      mirror,
    });

    await counted(json({ device_id: 'CTRL_001', shelf_id: 'A1', distance_cm: 25 }));

    assert.equal(lookups, 1);
    assert.equal(mirror.levels.length, 1);
  });

  it('works without a mirror', async () => {
    const analyzer = createAnalyzer(createGeometryResolver(store, {}), 2.0);
    const bare = createLevelMonitor({ store, analyzer, mirror: null });
    assert.equal(await bare(json({ device_id: 'CTRL_001', shelf_id: 'B1', distance_cm: 10 })), 'stored');
    assert.equal(store.querySensorData()[0].fillPercent, 50);
  });
});
