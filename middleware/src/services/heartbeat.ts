import type { HubContext } from './context';
import { recordHistory } from './mirror';
import { HeartbeatReplySchema, parseMessage } from './payloads';
import { awaitReply, collectReplies } from './requestReply';

export interface HeartbeatResult {
  online: boolean;
  lastSeen: string | null;
}

type HeartbeatContext = Pick<HubContext, 'bus' | 'topics' | 'timeouts' | 'store' | 'history' | 'now'>;

const acceptHeartbeat = (message: Buffer) => {
  const parsed = parseMessage(HeartbeatReplySchema, message);
  return parsed.ok ? parsed.data : null;
};

export async function checkDevice(ctx: HeartbeatContext, deviceId: string, timeoutMs = ctx.timeouts.heartbeatMs): Promise<HeartbeatResult> {
  const reply = await awaitReply(ctx.bus, {
    requestTopic: ctx.topics.heartbeat,
    responseTopic: ctx.topics.heartbeatResponse,
    request: { target_device: deviceId, timestamp: Date.now() },
    timeoutMs,
    accept: (message) => {
      const hb = acceptHeartbeat(message);
      return hb && hb.device_id === deviceId ? hb : null;
    },
  });

  await recordHistory(ctx.history, {
    action: 'heartbeat',
    deviceId,
    shelfId: null,
    status: reply ? 'COMPLETED' : 'ERROR',
  });

  if (!reply) {
    ctx.store.setDeviceStatus(deviceId, 'offline');
    console.warn(`[Heartbeat] ${deviceId} did not answer within ${timeoutMs} ms`);
    return { online: false, lastSeen: null };
  }

  const seenAt = (ctx.now ?? (() => new Date()))().toISOString();
  ctx.store.setDeviceStatus(deviceId, 'online', seenAt);
  console.log(`[Heartbeat] ${deviceId} is online`);
  return { online: true, lastSeen: seenAt };
}

/** Broadcast heartbeat; every registered device is marked by whether it answered. */
export async function checkAllDevices(
  ctx: HeartbeatContext,
  timeoutMs = ctx.timeouts.heartbeatMs,
): Promise<Record<string, HeartbeatResult>> {
  const deviceIds = ctx.store.listDeviceIds();
  if (deviceIds.length === 0) return {};

  const replies = await collectReplies(ctx.bus, {
    requestTopic: ctx.topics.heartbeat,
    responseTopic: ctx.topics.heartbeatResponse,
    request: { type: 'broadcast', timestamp: Date.now() },
    timeoutMs,
    accept: acceptHeartbeat,
    keyOf: (reply) => reply.device_id,
  });

  const answered = new Set(replies.map((reply) => reply.device_id));
  const seenAt = (ctx.now ?? (() => new Date()))().toISOString();
  const results: Record<string, HeartbeatResult> = {};

  for (const deviceId of deviceIds) {
    if (answered.has(deviceId)) {
      ctx.store.setDeviceStatus(deviceId, 'online', seenAt);
      results[deviceId] = { online: true, lastSeen: seenAt };
    } else {
      ctx.store.setDeviceStatus(deviceId, 'offline');
      results[deviceId] = { online: false, lastSeen: null };
    }
  }

  console.log(`[Heartbeat] ${answered.size}/${deviceIds.length} device(s) online`);
  await recordHistory(ctx.history, {
    action: 'heartbeat.all',
    deviceId: null,
    shelfId: null,
    status: 'COMPLETED',
    detail: `${answered.size}/${deviceIds.length} online`,
  });
  return results;
}
