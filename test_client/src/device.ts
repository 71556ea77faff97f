import {
  DEFAULT_TOPICS,
  type CalibrationReply,
  type DiscoveryReply,
  type HeartbeatReply,
  type SensorPayload,
  type ShelfConfigReply,
  type StatusPayload,
  type Topics,
} from '../../types';

export interface SimulatedShelf {
  shelfId: string;
  gpio: number;
  shelfLength: number; // what a calibration run would measure
  distanceCm: number; // current reading; -1 simulates a sensor fault
  enabled: boolean;
  sensorConnected: boolean;
}

type Publish = (topic: string, payload: string) => void;

/**
 * Device side of the shelf protocol, without a broker: feed it incoming
 * messages and it publishes what a real controller would answer.
 */
export class SimulatedShelfDevice {
  private readonly shelves = new Map<string, SimulatedShelf>();
  private readonly startedAt: number;

  constructor(
    readonly deviceId: string,
    shelves: SimulatedShelf[],
    private readonly publish: Publish,
    private readonly topics: Topics = DEFAULT_TOPICS,
    private readonly clock: () => number = Date.now,
  ) {
    shelves.forEach((shelf) => this.shelves.set(shelf.shelfId, { ...shelf }));
    this.startedAt = clock();
  }

  get subscriptions(): string[] {
    return [this.topics.command, this.topics.discovery, this.topics.heartbeat, this.topics.configRequest];
  }

  shelf(shelfId: string): SimulatedShelf | undefined {
    return this.shelves.get(shelfId);
  }

  setDistance(shelfId: string, distanceCm: number) {
    const shelf = this.shelves.get(shelfId);
    if (shelf) shelf.distanceCm = distanceCm;
  }

  handle(topic: string, message: string) {
    if (topic === this.topics.command) {
      this.handleCommand(message.trim());
    } else if (topic === this.topics.discovery) {
      this.send<DiscoveryReply>(this.topics.discoveryResponse, {
        device_id: this.deviceId,
        device_name: `Simulated ${this.deviceId}`,
        shelves: [...this.shelves.keys()],
        wifi_signal: -48,
        uptime_ms: this.uptime(),
      });
    } else if (topic === this.topics.heartbeat) {
      const request = this.parse(message);
      const target = request && typeof request.target_device === 'string' ? request.target_device : null;
      if (target === null || target === this.deviceId) {
        this.send<HeartbeatReply>(this.topics.heartbeatResponse, {
          device_id: this.deviceId,
          status: 'online',
          timestamp: this.clock(),
        });
      }
    } else if (topic === this.topics.configRequest) {
      const request = this.parse(message);
      if (request && request.device_id === this.deviceId) this.sendConfig();
    }
  }

  publishStatus() {
    this.send<StatusPayload>(this.topics.status, {
      device_id: this.deviceId,
      wifi: 'connected',
      mqtt: 'connected',
      uptime_ms: this.uptime(),
      shelf_count: this.shelves.size,
    });
  }

  publishReading(shelfId: string) {
    const shelf = this.shelves.get(shelfId);
    if (!shelf || !shelf.enabled) return;

    this.send<SensorPayload>(this.topics.sensor, {
      device_id: this.deviceId,
      shelf_id: shelf.shelfId,
      distance_cm: shelf.sensorConnected ? shelf.distanceCm : -1,
    });
  }

  publishAllReadings() {
    this.shelves.forEach((shelf) => this.publishReading(shelf.shelfId));
  }

  private handleCommand(command: string) {
    const [verb, shelfId] = command.split(/\s+/, 2);

    switch (verb) {
      case 'status':
        this.publishStatus();
        return;
      case 'data':
        this.publishAllReadings();
        return;
      case 'shelf':
        if (shelfId) this.publishReading(shelfId);
        return;
      case 'enable':
      case 'disable': {
        const shelf = shelfId ? this.shelves.get(shelfId) : undefined;
        if (!shelf) return;
        shelf.enabled = verb === 'enable';
        this.sendConfig();
        return;
      }
      case 'calibrate': {
        const shelf = shelfId ? this.shelves.get(shelfId) : undefined;
        if (!shelf) return;
        this.send<CalibrationReply>(this.topics.calibrateResponse, {
          device_id: this.deviceId,
          shelf_id: shelf.shelfId,
          success: shelf.sensorConnected,
          shelf_length: shelf.sensorConnected ? shelf.shelfLength : 0,
        });
        return;
      }
      default:
        console.warn(`[Device ${this.deviceId}] Unknown command: ${command}`);
    }
  }

  private sendConfig() {
    const shelves = [...this.shelves.values()].map((shelf, index) => ({
      shelf_id: shelf.shelfId,
      index,
      gpio: shelf.gpio,
      enabled: shelf.enabled,
      sensor_connected: shelf.sensorConnected,
      shelf_length: shelf.shelfLength,
    }));

    this.send<ShelfConfigReply>(this.topics.configResponse, {
      device_id: this.deviceId,
      shelves,
      total_count: shelves.length,
      enabled_count: shelves.filter((s) => s.enabled).length,
    });
  }

  private uptime() {
    return this.clock() - this.startedAt;
  }

  private parse(message: string): Record<string, unknown> | null {
    try {
      const value: unknown = JSON.parse(message);
      return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : null;
    } catch {
      return null;
    }
  }

  private send<T>(topic: string, payload: T) {
    this.publish(topic, JSON.stringify(payload));
  }
}
