import type { ShelfCommand } from '../../../types';
import type { HubContext } from './context';
import { recordHistory } from './mirror';

type ControlContext = Pick<HubContext, 'bus' | 'topics' | 'history'>;

/**
 * Every controller listens on the same command topic and picks out the
 * commands for shelves it owns, so deviceId only labels the history entry.
 */
export async function sendCommand(
  { bus, topics, history }: ControlContext,
  command: ShelfCommand,
  target: { deviceId?: string | null; shelfId?: string | null } = {},
): Promise<boolean> {
  const sent = await bus.publish(topics.command, command);

  if (sent) {
    console.log(`[Command] ✓ Sent: ${command}`);
  } else {
    console.warn(`[Command] ✗ Could not send: ${command}`);
  }

  await recordHistory(history, {
    action: command.split(' ')[0],
    deviceId: target.deviceId ?? null,
    shelfId: target.shelfId ?? null,
    status: sent ? 'COMPLETED' : 'ERROR',
  });

  return sent;
}

export const requestSystemStatus = (ctx: ControlContext, deviceId?: string) => sendCommand(ctx, 'status', { deviceId });

export const requestAllData = (ctx: ControlContext, deviceId?: string) => sendCommand(ctx, 'data', { deviceId });

export const requestShelfData = (ctx: ControlContext, shelfId: string, deviceId?: string) =>
  sendCommand(ctx, `shelf ${shelfId}`, { deviceId, shelfId });

export const calibrateShelf = (ctx: ControlContext, shelfId: string, deviceId?: string) =>
  sendCommand(ctx, `calibrate ${shelfId}`, { deviceId, shelfId });

/** Sends enable/disable and, once the command is out, records the new state locally. */
export async function setShelfEnabled(
  ctx: Pick<HubContext, 'bus' | 'topics' | 'history' | 'store'>,
  shelfId: string,
  enabled: boolean,
): Promise<boolean> {
  const shelf = ctx.store.getShelf(shelfId);
  const command: ShelfCommand = enabled ? `enable ${shelfId}` : `disable ${shelfId}`;

  const sent = await sendCommand(ctx, command, { deviceId: shelf?.deviceId, shelfId });
  if (!sent) return false;

  ctx.store.setShelfEnabled(shelfId, enabled);
  return true;
}
