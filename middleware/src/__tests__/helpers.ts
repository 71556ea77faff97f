import { DEFAULT_TOPICS } from '../../../types';
import { DEFAULT_SHELVES, type AppConfig, type Topics } from '../config';
import { createAnalyzer } from '../services/analyzer';
import type { HubContext } from '../services/context';
import { ShelfStore } from '../services/database';
import type { CommandHistory, HistoryItem, LevelSnapshot, LiveMirror } from '../services/mirror';
import type { MessageBus, MessageHandler } from '../services/mqttService';
import { createGeometryResolver } from '../services/shelfGeometry';

export const T0 = '2026-03-01T12:00:00.000Z';

export const TOPICS: Topics = { ...DEFAULT_TOPICS };

export const FAST_TIMEOUTS: AppConfig['timeouts'] = { discoveryMs: 40, heartbeatMs: 40, shelfConfigMs: 40 };

/** Settable clock for the store. */
export class TestClock {
  current = new Date(T0);

  now = () => this.current;

  set(iso: string) {
    this.current = new Date(iso);
  }
}

export function createTestStore(clock = new TestClock()): ShelfStore {
  return new ShelfStore({ filePath: ':memory:', shelfDefaults: { ...DEFAULT_SHELVES }, now: clock.now });
}

/**
 * In-process broker. Whatever the responder publishes back is delivered on
 * the next turn of the event loop, like a round trip through a real broker.
 */
export class FakeBus implements MessageBus {
  published: Array<{ topic: string; payload: string }> = [];
  online = true;
  responder: ((topic: string, payload: string) => void) | null = null;
  private handlers = new Set<MessageHandler>();

  async publish(topic: string, payload: string): Promise<boolean> {
    if (!this.online) return false;
    this.published.push({ topic, payload });
    const responder = this.responder;
    if (responder) setImmediate(() => responder(topic, payload));
    return true;
  }

  onMessage(handler: MessageHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  emit(topic: string, payload: string | object) {
    const body = typeof payload === 'string' ? payload : JSON.stringify(payload);
    this.handlers.forEach((handler) => handler(topic, Buffer.from(body)));
  }

  get listenerCount() {
    return this.handlers.size;
  }
}

export class MemoryHistory implements CommandHistory {
  items: HistoryItem[] = [];

  async record(item: HistoryItem) {
    this.items.push(item);
  }
}

export function createTestContext(overrides: Partial<Omit<HubContext, 'bus'>> = {}): HubContext & { bus: FakeBus } {
  const clock = new TestClock();
  const store = overrides.store ?? createTestStore(clock);
  const resolver = createGeometryResolver(store, { ...DEFAULT_SHELVES });

  return {
    store,
    analyzer: createAnalyzer(resolver, 2.0),
    history: null,
    topics: TOPICS,
    timeouts: FAST_TIMEOUTS,
    now: clock.now,
    ...overrides,
    bus: new FakeBus(),
  };
}

export class RecordingMirror implements LiveMirror {
  levels: Array<[string, LevelSnapshot]> = [];
  statuses: Array<[string, boolean]> = [];
  failing = false;

  async publishLevel(shelfId: string, level: LevelSnapshot) {
    if (this.failing) throw new Error('mirror offline');
    this.levels.push([shelfId, level]);
  }

  async publishStatus(deviceId: string, online: boolean) {
    if (this.failing) throw new Error('mirror offline');
    this.statuses.push([deviceId, online]);
  }
}

export const json = (value: object) => Buffer.from(JSON.stringify(value));
