import 'dotenv/config';
import mqttService from './services/mqttService';
import { loadConfig } from './config';
import { initFirebase } from './services/firebase';
import { createFirebaseMirror, createFirestoreHistory } from './services/mirror';
import { ShelfStore } from './services/database';
import { createGeometryResolver } from './services/shelfGeometry';
import { createAnalyzer } from './services/analyzer';
import { initializeShelves } from './services/initShelves';
import { registerPlanner } from './services/planner';
import { createLevelMonitor } from './services/levelMonitor';
import { createStatusMonitor } from './services/statusMonitor';
import { createCalibrationHandler } from './services/calibration';
import { createShelfConfigHandler } from './services/shelfConfig';
import type { HubContext } from './services/context';
import { createServer } from './server';

const config = loadConfig();
const { topics } = config.mqtt;

const firebase = initFirebase(config.firebase.serviceAccountPath, config.firebase.databaseURL);
const mirror = firebase ? createFirebaseMirror(firebase) : null;
const history = firebase ? createFirestoreHistory(firebase) : null;

const store = new ShelfStore({ filePath: config.database.file, shelfDefaults: config.analysis.shelfDefaults });
console.log(`[Database] Ready: ${config.database.file}`);

if (config.database.seedDefaults) {
  initializeShelves(store);
}

const resolver = createGeometryResolver(store, config.analysis.shelfDefaults);
const analyzer = createAnalyzer(resolver, config.analysis.occupiedThresholdCm);

const ctx: HubContext = {
  bus: mqttService,
  store,
  analyzer,
  history,
  topics,
  timeouts: config.timeouts,
};

const handleSensorData = createLevelMonitor({ store, analyzer, mirror });
const handleStatusUpdate = createStatusMonitor({ store, mirror });
const handleCalibration = createCalibrationHandler({ store, history });
const handleShelfConfig = createShelfConfigHandler({ store });

mqttService.connect({
  host: config.mqtt.host,
  port: config.mqtt.port,
  clientId: config.mqtt.clientId,
  username: config.mqtt.username,
  password: config.mqtt.password,
  subscriptions: [
    topics.sensor,
    topics.status,
    topics.calibrateResponse,
    topics.configResponse,
    topics.discoveryResponse,
    topics.heartbeatResponse,
  ],
});

mqttService.onMessage((topic, msg) => {
  const failed = (error: unknown) => console.error(`Failed to handle message on ${topic}:`, error);

  if (topic === topics.sensor) {
    handleSensorData(msg).catch(failed);
  } else if (topic === topics.status) {
    handleStatusUpdate(msg).catch(failed);
  } else if (topic === topics.calibrateResponse) {
    handleCalibration(msg).catch(failed);
  } else if (topic === topics.configResponse) {
    handleShelfConfig(msg);
  }
});

const tasks = registerPlanner(ctx, config.schedule);

const server = createServer(ctx, config.corsOrigin).listen(config.port, () => {
  console.log(`Console API running on http://localhost:${config.port}`);
});

const shutdown = (signal: string) => {
  console.log(`\n${signal} received, shutting down...`);
  tasks.forEach((task) => task.stop());
  server.close();
  mqttService
    .disconnect()
    .catch((error) => console.error('Error disconnecting MQTT:', error))
    .finally(() => {
      store.close();
      process.exit(0);
    });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
