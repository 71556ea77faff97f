import type { AppConfig, Topics } from '../config';
import type { OccupancyAnalyzer } from './analyzer';
import type { ShelfStore } from './database';
import type { CommandHistory } from './mirror';
import type { MessageBus } from './mqttService';

/** Everything the orchestration services and console routes share. */
export interface HubContext {
  bus: MessageBus;
  store: ShelfStore;
  analyzer: OccupancyAnalyzer;
  history: CommandHistory | null;
  topics: Topics;
  timeouts: AppConfig['timeouts'];
  now?: () => Date;
}
