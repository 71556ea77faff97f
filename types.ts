export interface ShelfGeometry {
  maxDistance: number; // cm from sensor to the back wall of an empty shelf
  productLength: number | null; // cm, one unit of the bound product
}

export interface AnalysisResult {
  occupied: boolean;
  fillPercent: number;
}

export type DeviceStatus = 'online' | 'offline';

export interface Device {
  deviceId: string;
  deviceName: string;
  location: string | null;
  status: DeviceStatus;
  lastSeen: string | null;
  createdAt: string;
}

export interface Product {
  productId: string;
  productName: string;
  productLength: number;
  description: string | null;
  createdAt: string;
}

export interface Shelf {
  shelfId: string;
  deviceId: string;
  productId: string | null;
  productName: string | null;
  productLength: number | null;
  maxDistance: number;
  shelfLength: number; // calibrated length, 0 until calibrated
  sensorConnected: boolean;
  enabled: boolean;
  gpio: number | null;
  stockQuantity: number;
  positionIndex: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface SensorRecord {
  id: number;
  deviceId: string;
  shelfId: string;
  distanceCm: number;
  occupied: boolean;
  fillPercent: number;
  timestamp: string;
}

// --- MQTT topics, shared by the hub and the controllers ---

export interface Topics {
  sensor: string;
  status: string;
  command: string;
  discovery: string;
  discoveryResponse: string;
  heartbeat: string;
  heartbeatResponse: string;
  configRequest: string;
  configResponse: string;
  calibrateResponse: string;
}

export const DEFAULT_TOPICS: Readonly<Topics> = Object.freeze({
  sensor: 'shelf/sensor',
  status: 'shelf/status',
  command: 'shelf/command',
  discovery: 'shelf/discovery',
  discoveryResponse: 'shelf/discovery/response',
  heartbeat: 'shelf/heartbeat',
  heartbeatResponse: 'shelf/heartbeat/response',
  configRequest: 'shelf/config/request',
  configResponse: 'shelf/config/response',
  calibrateResponse: 'shelf/calibrate/response',
});

// --- MQTT payloads (snake_case, as the controllers send them) ---

export interface SensorPayload {
  device_id: string;
  shelf_id: string;
  distance_cm: number;
}

export interface StatusPayload {
  device_id: string;
  wifi?: string;
  mqtt?: string;
  uptime_ms?: number;
  shelf_count?: number;
}

export interface DiscoveryReply {
  device_id: string;
  device_name?: string;
  shelves?: string[];
  wifi_signal?: number | string;
  uptime_ms?: number;
}

export interface HeartbeatReply {
  device_id: string;
  status?: string;
  timestamp?: number;
}

export interface ShelfConfigEntry {
  shelf_id: string;
  index?: number;
  gpio?: number;
  enabled?: boolean;
  sensor_connected?: boolean;
  shelf_length?: number;
}

export interface ShelfConfigReply {
  device_id: string;
  shelves: ShelfConfigEntry[];
  total_count?: number;
  enabled_count?: number;
}

export interface CalibrationReply {
  device_id: string;
  shelf_id: string;
  success: boolean;
  shelf_length: number;
}

export type ShelfCommand =
  | 'status'
  | 'data'
  | `shelf ${string}`
  | `enable ${string}`
  | `disable ${string}`
  | `calibrate ${string}`;
