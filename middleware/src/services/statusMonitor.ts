import { formatUptime } from './analyzer';
import type { ShelfStore } from './database';
import type { LiveMirror } from './mirror';
import { parseMessage, StatusPayloadSchema } from './payloads';

export interface StatusMonitorDeps {
  store: ShelfStore;
  mirror: LiveMirror | null;
}

/** Returns the id of the device that reported, or null for a plain-text status line. */
export const createStatusMonitor = ({ store, mirror }: StatusMonitorDeps) =>
  async (message: Buffer): Promise<string | null> => {
    const parsed = parseMessage(StatusPayloadSchema, message);

    if (!parsed.ok) {
      console.log(`[Status] ${message.toString()}`);
      return null;
    }

    const { device_id: deviceId, wifi, mqtt, uptime_ms: uptimeMs, shelf_count: shelfCount } = parsed.data;

    const parts = [`WiFi: ${wifi ?? 'N/A'}`, `MQTT: ${mqtt ?? 'N/A'}`];
    if (uptimeMs !== undefined && uptimeMs > 0) parts.push(`uptime ${formatUptime(uptimeMs)}`);
    parts.push(`shelves: ${shelfCount ?? 'N/A'}`);
    console.log(`[Status] Device ${deviceId} is ONLINE (${parts.join(', ')})`);

    store.registerDevice(deviceId);

    if (mirror) {
      try {
        await mirror.publishStatus(deviceId, true);
      } catch (error) {
        console.error('Failed to update status in DB:', error);
      }
    }

    return deviceId;
  };
