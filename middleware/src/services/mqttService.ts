import mqtt, { MqttClient } from 'mqtt';

export type QoS = 0 | 1 | 2;

export type MessageHandler = (topic: string, message: Buffer) => void;

/** The slice of the broker connection the rest of the hub depends on. */
export interface MessageBus {
  publish(topic: string, payload: string, qos?: QoS): Promise<boolean>;
  onMessage(handler: MessageHandler): () => void;
}

export interface MqttConnectOptions {
  host: string;
  port: number;
  clientId: string;
  username?: string;
  password?: string;
  subscriptions: string[];
}

export class MqttService implements MessageBus {
  private client: MqttClient | null = null;
  private static instance: MqttService;
  private messageHandlers: MessageHandler[] = [];

  private constructor() {}

  public static getInstance(): MqttService {
    if (!MqttService.instance) {
      MqttService.instance = new MqttService();
    }
    return MqttService.instance;
  }

  public connect({ host, port, clientId, username, password, subscriptions }: MqttConnectOptions): void {
    const connectUrl = `mqtt://${host}:${port}`;
    console.log(`Connecting to MQTT Broker at ${connectUrl}...`);

    this.client = mqtt.connect(connectUrl, {
      clientId,
      clean: true,
      connectTimeout: 7000,
      username,
      password,
      reconnectPeriod: 1000,
    });

    this.client.on('connect', () => {
      console.log('✅ MQTT Connected');

      this.client?.subscribe(subscriptions, (err) => {
        if (err) {
          console.error('❌ MQTT Subscribe failed:', err);
          return;
        }
        subscriptions.forEach((topic) => console.log(`[Subscribed] ${topic}`));
      });
    });

    this.client.on('offline', () => {
      console.warn('⚠️ MQTT offline, reconnecting...');
    });

    this.client.on('error', (err) => {
      console.error('❌ MQTT Error:', err);
    });

    this.client.on('message', (topic, message) => {
      this.messageHandlers.forEach((handler) => {
        try {
          handler(topic, message);
        } catch (error) {
          console.error(`Handler failed for ${topic}:`, error);
        }
      });
    });
  }

  public publish(topic: string, payload: string, qos: QoS = 0): Promise<boolean> {
    const client = this.client;
    if (!client || !client.connected) {
      console.error(`Cannot publish to ${topic}: MQTT not connected`);
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      client.publish(topic, payload, { qos }, (err) => {
        if (err) {
          console.error(`Failed to publish to ${topic}:`, err);
          resolve(false);
        } else {
          resolve(true);
        }
      });
    });
  }

  public onMessage(handler: MessageHandler): () => void {
    this.messageHandlers.push(handler);
    return () => {
      this.messageHandlers = this.messageHandlers.filter((h) => h !== handler);
    };
  }

  public async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;

    await client.endAsync();
    this.client = null;
    console.log('MQTT disconnected');
  }
}

export default MqttService.getInstance();
