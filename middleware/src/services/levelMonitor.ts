import { isValidDistance, type OccupancyAnalyzer } from './analyzer';
import type { ShelfStore } from './database';
import type { LiveMirror } from './mirror';
import { parseMessage, SensorPayloadSchema } from './payloads';

export type SensorOutcome = 'stored' | 'invalid' | 'malformed';

export interface LevelMonitorDeps {
  store: ShelfStore;
  analyzer: OccupancyAnalyzer;
  mirror: LiveMirror | null;
}

export const createLevelMonitor = ({ store, analyzer, mirror }: LevelMonitorDeps) =>
  async (message: Buffer): Promise<SensorOutcome> => {
    const parsed = parseMessage(SensorPayloadSchema, message);
    if (!parsed.ok) {
      console.error(`[Sensor] Dropped malformed reading (${parsed.error}): ${message.toString()}`);
      return 'malformed';
    }

    const { device_id: deviceId, shelf_id: shelfId, distance_cm: distanceCm } = parsed.data;

    if (!isValidDistance(distanceCm)) {
      console.warn(`[Sensor] ✗ Ignored reading from ${deviceId}/${shelfId}: ${distanceCm} cm (sensor fault or out of range)`);
      return 'invalid';
    }

    const { occupied, fillPercent, estimatedCount } = analyzer.assess(shelfId, distanceCm);
    store.saveSensorData(deviceId, shelfId, distanceCm, occupied, fillPercent);

    // a unit estimate means a product is bound; only then is there a product line to log
    const shelf = estimatedCount !== null ? store.getShelf(shelfId) : null;

    const product = shelf?.productName ? ` [${shelf.productName}, stock ${shelf.stockQuantity}]` : '';
    const state = occupied ? `occupied ${fillPercent.toFixed(1)}%` : 'empty';
    const count = estimatedCount !== null ? `, ~${estimatedCount} units` : '';
    console.log(`[Sensor] ${deviceId}/${shelfId}${product}: ${distanceCm.toFixed(1)} cm -> ${state}${count}`);

    if (mirror) {
      try {
        await mirror.publishLevel(shelfId, { deviceId, distanceCm, occupied, fillPercent, estimatedCount });
      } catch (error) {
        console.error(`[Sensor] Failed to mirror level for ${shelfId}:`, error);
      }
    }

    return 'stored';
  };
