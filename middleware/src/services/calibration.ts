import type { ShelfStore } from './database';
import type { CommandHistory } from './mirror';
import { recordHistory } from './mirror';
import { CalibrationReplySchema, parseMessage } from './payloads';

export interface CalibrationDeps {
  store: ShelfStore;
  history: CommandHistory | null;
}

export type CalibrationOutcome = 'calibrated' | 'failed' | 'unknown-shelf' | 'malformed';

export const createCalibrationHandler = ({ store, history }: CalibrationDeps) =>
  async (message: Buffer): Promise<CalibrationOutcome> => {
    const parsed = parseMessage(CalibrationReplySchema, message);
    if (!parsed.ok) {
      console.error(`[Calibrate] Dropped malformed reply (${parsed.error}): ${message.toString()}`);
      return 'malformed';
    }

    const { device_id: deviceId, shelf_id: shelfId, success, shelf_length: shelfLength } = parsed.data;

    // a reported success without a usable length is still a failed measurement
    if (!success || !(shelfLength > 0)) {
      const reason = success
        ? `measured length ${shelfLength} cm is not usable`
        : 'sensor not connected or reading abnormal';
      console.warn(`[Calibrate] ✗ ${deviceId}/${shelfId} failed: ${reason}`);
      await recordHistory(history, {
        action: 'calibrate.result',
        deviceId,
        shelfId,
        status: 'ERROR',
        detail: reason,
      });
      return 'failed';
    }

    if (!store.updateShelfCalibration(shelfId, shelfLength)) {
      console.warn(`[Calibrate] ${deviceId}/${shelfId} measured ${shelfLength.toFixed(2)} cm but the shelf is not registered`);
      return 'unknown-shelf';
    }

    console.log(`[Calibrate] ✓ ${deviceId}/${shelfId} shelf length ${shelfLength.toFixed(2)} cm saved`);
    await recordHistory(history, {
      action: 'calibrate.result',
      deviceId,
      shelfId,
      status: 'COMPLETED',
      detail: `shelf length ${shelfLength.toFixed(2)} cm`,
    });
    return 'calibrated';
  };
