import 'dotenv/config';
import mqtt, { IClientOptions } from 'mqtt';
import { SimulatedShelfDevice } from './device';

// Configuration
const BROKER_URL = process.env.MQTT_URL || 'mqtt://localhost:1883';
const DEVICE_ID = process.env.DEVICE_ID || 'CTRL_SIM';
const PUBLISH_INTERVAL_MS = parseInt(process.env.PUBLISH_INTERVAL_MS || '5000', 10);

console.log(`🔌 Connecting Test Device (${DEVICE_ID}) to ${BROKER_URL}...`);

const options: IClientOptions = {
  clean: true,
  connectTimeout: 4000,
  clientId: `${DEVICE_ID}-${Math.random().toString(16).slice(2, 8)}`,
  username: process.env.MQTT_USERNAME,
  password: process.env.MQTT_PASSWORD,
};

const client = mqtt.connect(BROKER_URL, options);

const device = new SimulatedShelfDevice(
  DEVICE_ID,
  [
    { shelfId: 'A1', gpio: 13, shelfLength: 30, distanceCm: 12, enabled: true, sensorConnected: true },
    { shelfId: 'A2', gpio: 14, shelfLength: 30, distanceCm: 29, enabled: true, sensorConnected: true },
    { shelfId: 'B1', gpio: 27, shelfLength: 20, distanceCm: -1, enabled: false, sensorConnected: false },
  ],
  (topic, payload) => client.publish(topic, payload),
);

let timer: NodeJS.Timeout | undefined;

client.on('connect', () => {
  console.log(`✅ Device Connected!`);

  client.subscribe(device.subscriptions, (err) => {
    if (err) console.error('Subscribe error:', err);
  });

  device.publishStatus();

  if (timer) clearInterval(timer);
  timer = setInterval(() => {
    // items get taken and put back
    const a1 = device.shelf('A1');
    if (a1) device.setDistance('A1', Math.min(30, Math.max(0, a1.distanceCm + (Math.random() * 4 - 2))));
    device.publishAllReadings();
  }, PUBLISH_INTERVAL_MS);
});

client.on('message', (topic, message) => {
  console.log(`📩 ${topic}: ${message.toString()}`);
  device.handle(topic, message.toString());
});

client.on('error', (err) => {
  console.error('Connection Error:', err);
});

process.on('SIGINT', () => {
  if (timer) clearInterval(timer);
  client.end(false, {}, () => process.exit(0));
});
