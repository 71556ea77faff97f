import type { HubContext } from './context';
import { recordHistory } from './mirror';
import { DiscoveryReplySchema, parseMessage } from './payloads';
import { collectReplies } from './requestReply';

export interface DiscoveredDevice {
  deviceId: string;
  deviceName: string;
  shelves: string[];
  shelfCount: number;
  wifiSignal: number | string;
  uptimeMs: number;
  registered: boolean;
}

export async function discoverDevices(
  { bus, topics, timeouts, store, history }: Pick<HubContext, 'bus' | 'topics' | 'timeouts' | 'store' | 'history'>,
  timeoutMs = timeouts.discoveryMs,
): Promise<DiscoveredDevice[]> {
  console.log(`[Discovery] Broadcasting discover request (waiting ${timeoutMs} ms)...`);

  const replies = await collectReplies(bus, {
    requestTopic: topics.discovery,
    responseTopic: topics.discoveryResponse,
    request: { command: 'discover', timestamp: Date.now() },
    timeoutMs,
    accept: (message) => {
      const parsed = parseMessage(DiscoveryReplySchema, message);
      return parsed.ok ? parsed.data : null;
    },
    keyOf: (reply) => reply.device_id,
  });

  console.log(`[Discovery] ${replies.length} device(s) answered`);
  await recordHistory(history, {
    action: 'discover',
    deviceId: null,
    shelfId: null,
    status: 'COMPLETED',
    detail: `${replies.length} device(s) answered`,
  });

  return replies.map((reply) => ({
    deviceId: reply.device_id,
    deviceName: reply.device_name ?? reply.device_id,
    shelves: reply.shelves,
    shelfCount: reply.shelves.length,
    wifiSignal: reply.wifi_signal ?? 'N/A',
    uptimeMs: reply.uptime_ms,
    registered: store.getDevice(reply.device_id) !== null,
  }));
}
