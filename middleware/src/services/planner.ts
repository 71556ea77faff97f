import * as cron from 'node-cron';
import type { AppConfig } from '../config';
import type { HubContext } from './context';
import { checkAllDevices } from './heartbeat';

export async function runRetentionSweep(ctx: Pick<HubContext, 'store'>, keepDays: number, keepMinRecords: number) {
  console.log(`[Planner] Cleaning sensor data older than ${keepDays} day(s), keeping at least ${keepMinRecords} rows...`);

  try {
    const { before, after, deleted } = ctx.store.cleanOldSensorData(keepDays, keepMinRecords);
    if (deleted === 0) {
      console.log(`[Planner] Nothing to clean (${before} rows)`);
    } else {
      console.log(`[Planner] Removed ${deleted} rows (${before} -> ${after})`);
    }
  } catch (error) {
    console.error('[Planner] Retention sweep failed:', error);
  }
}

export async function runHeartbeatSweep(ctx: HubContext) {
  console.log(`[Planner] Heartbeat sweep at ${new Date().toISOString()}...`);

  try {
    const results = await checkAllDevices(ctx);
    const offline = Object.entries(results)
      .filter(([, r]) => !r.online)
      .map(([id]) => id);
    if (offline.length) {
      console.warn(`[Planner] Offline: ${offline.join(', ')}`);
    }
  } catch (error) {
    console.error('[Planner] Heartbeat sweep failed:', error);
  }
}

export function registerPlanner(ctx: HubContext, schedule: AppConfig['schedule']): cron.ScheduledTask[] {
  return [
    cron.schedule(schedule.heartbeatCron, () => runHeartbeatSweep(ctx)),
    cron.schedule(schedule.retentionCron, () =>
      runRetentionSweep(ctx, schedule.keepDays, schedule.keepMinRecords),
    ),
  ];
}
