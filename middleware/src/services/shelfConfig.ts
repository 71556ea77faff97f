import type { HubContext } from './context';
import type { ShelfStore } from './database';
import { recordHistory } from './mirror';
import { parseMessage, ShelfConfigReplySchema, type ParsedShelfConfigReply } from './payloads';
import { awaitReply } from './requestReply';

/** Handles every config reply on the bus, requested by us or not. */
export const createShelfConfigHandler = ({ store }: { store: ShelfStore }) =>
  (message: Buffer): number => {
    const parsed = parseMessage(ShelfConfigReplySchema, message);
    if (!parsed.ok) {
      console.error(`[ShelfConfig] Dropped malformed reply (${parsed.error})`);
      return 0;
    }

    const { device_id: deviceId, shelves } = parsed.data;
    const applied = store.applyDeviceShelfConfig(deviceId, shelves);
    console.log(`[ShelfConfig] ✓ ${deviceId}: ${applied} shelf config(s) synced`);
    return applied;
  };

export async function queryShelfConfig(
  { bus, topics, timeouts, history }: Pick<HubContext, 'bus' | 'topics' | 'timeouts' | 'history'>,
  deviceId: string,
  timeoutMs = timeouts.shelfConfigMs,
): Promise<ParsedShelfConfigReply | null> {
  console.log(`[ShelfConfig] Querying shelf config of ${deviceId}...`);

  const reply = await awaitReply(bus, {
    requestTopic: topics.configRequest,
    responseTopic: topics.configResponse,
    request: { device_id: deviceId },
    timeoutMs,
    accept: (message) => {
      const parsed = parseMessage(ShelfConfigReplySchema, message);
      return parsed.ok && parsed.data.device_id === deviceId ? parsed.data : null;
    },
  });

  if (!reply) {
    console.warn(`[ShelfConfig] No reply from ${deviceId} within ${timeoutMs} ms (device offline?)`);
  }
  await recordHistory(history, {
    action: 'config.query',
    deviceId,
    shelfId: null,
    status: reply ? 'COMPLETED' : 'ERROR',
  });
  return reply;
}
