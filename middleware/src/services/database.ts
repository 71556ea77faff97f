import path from 'path';
import fs from 'fs';
import Database from 'better-sqlite3';
import type { Device, DeviceStatus, Product, SensorRecord, Shelf, ShelfConfigEntry } from '../../../types';
import type { ShelfDefaults } from '../config';
import type { ShelfRecordSource } from './shelfGeometry';

export type ShelfStoreConfig = {
  filePath: string;
  shelfDefaults: ShelfDefaults;
  now?: () => Date;
};

export class StoreConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreConflictError';
  }
}

export class StoreNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreNotFoundError';
  }
}

type DeviceRow = {
  device_id: string;
  device_name: string | null;
  location: string | null;
  status: string;
  last_seen: string | null;
  created_at: string;
};

type ProductRow = {
  product_id: string;
  product_name: string;
  product_length: number;
  description: string | null;
  created_at: string;
};

type ShelfRow = {
  shelf_id: string;
  device_id: string;
  product_id: string | null;
  product_name: string | null;
  product_length: number | null;
  max_distance: number;
  shelf_length: number | null;
  sensor_connected: number;
  enabled: number;
  gpio: number | null;
  stock_quantity: number | null;
  position_index: number | null;
  created_at: string;
  updated_at: string;
};

type SensorRow = {
  id: number;
  device_id: string;
  shelf_id: string;
  distance_cm: number;
  occupied: number;
  fill_percent: number;
  timestamp: string;
};

export type DeviceListing = Device & { shelfCount: number };
export type ShelfListing = Shelf & { deviceName: string | null; location: string | null };
export type ProductListing = Product & {
  shelfId: string | null;
  stockQuantity: number | null;
  location: string | null;
  deviceName: string | null;
};

export interface StockSummaryItem {
  productId: string;
  productName: string | null;
  productLength: number | null;
  shelfCount: number;
  totalStock: number;
}

export interface StoreStats {
  deviceCount: number;
  onlineDevices: number;
  shelfCount: number;
  shelvesWithProducts: number;
  productCount: number;
  totalStock: number;
  dataCount: number;
  occupiedCount: number;
  occupancyRate: number;
}

export interface RetentionResult {
  before: number;
  after: number;
  deleted: number;
}

export interface NewDevice {
  deviceId: string;
  deviceName: string;
  location?: string | null;
  fromDiscovery?: boolean;
}

export interface NewProduct {
  productId: string;
  productName: string;
  productLength: number;
  description?: string | null;
  shelfId?: string | null;
  stockQuantity?: number;
}

export interface NewShelf {
  shelfId: string;
  deviceId: string;
  maxDistance: number;
  productId?: string | null;
  productName?: string | null;
  productLength?: number | null;
  stockQuantity?: number;
  positionIndex?: number | null;
}

const toDevice = (row: DeviceRow): Device => ({
  deviceId: row.device_id,
  deviceName: row.device_name ?? row.device_id,
  location: row.location,
  status: row.status === 'online' ? 'online' : 'offline',
  lastSeen: row.last_seen,
  createdAt: row.created_at,
});

const toProduct = (row: ProductRow): Product => ({
  productId: row.product_id,
  productName: row.product_name,
  productLength: row.product_length,
  description: row.description,
  createdAt: row.created_at,
});

const toShelf = (row: ShelfRow): Shelf => ({
  shelfId: row.shelf_id,
  deviceId: row.device_id,
  productId: row.product_id,
  productName: row.product_name,
  productLength: row.product_length,
  maxDistance: row.max_distance,
  shelfLength: row.shelf_length ?? 0,
  sensorConnected: row.sensor_connected === 1,
  enabled: row.enabled === 1,
  gpio: row.gpio,
  stockQuantity: row.stock_quantity ?? 0,
  positionIndex: row.position_index,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

const toSensorRecord = (row: SensorRow): SensorRecord => ({
  id: row.id,
  deviceId: row.device_id,
  shelfId: row.shelf_id,
  distanceCm: row.distance_cm,
  occupied: row.occupied === 1,
  fillPercent: row.fill_percent,
  timestamp: row.timestamp,
});

const isConstraintError = (error: unknown): boolean =>
  error instanceof Error &&
  'code' in error &&
  typeof error.code === 'string' &&
  error.code.startsWith('SQLITE_CONSTRAINT');

// "A1" -> 1, "B12" -> 12, anything else -> 0
export const positionFromShelfId = (shelfId: string): number => {
  const parsed = parseInt(shelfId.slice(1), 10);
  return Number.isNaN(parsed) ? 0 : parsed;
};

export class ShelfStore implements ShelfRecordSource {
  private db: Database.Database;
  private readonly shelfDefaults: ShelfDefaults;
  private readonly now: () => Date;

  constructor(cfg: ShelfStoreConfig) {
    if (cfg.filePath !== ':memory:') {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    if (cfg.filePath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.shelfDefaults = cfg.shelfDefaults;
    this.now = cfg.now ?? (() => new Date());
    this.init();
  }

  private init(): void {
    this.db.exec(`
      create table if not exists devices (
        device_id text primary key,
        device_name text,
        location text,
        status text default 'offline',
        last_seen text,
        created_at text not null
      );

      create table if not exists products (
        product_id text primary key,
        product_name text not null,
        product_length real not null,
        description text,
        created_at text not null
      );

      create table if not exists shelves (
        shelf_id text primary key,
        device_id text not null,
        product_id text,
        product_name text,
        product_length real,
        max_distance real not null,
        shelf_length real default 0,
        sensor_connected integer default 0,
        enabled integer default 1,
        gpio integer,
        stock_quantity integer default 0,
        position_index integer,
        created_at text not null,
        updated_at text not null,
        foreign key (device_id) references devices(device_id),
        foreign key (product_id) references products(product_id)
      );

      create table if not exists sensor_data (
        id integer primary key autoincrement,
        device_id text not null,
        shelf_id text not null,
        distance_cm real not null,
        occupied integer not null,
        fill_percent real not null,
        timestamp text not null
      );

      create table if not exists stock_changes (
        id integer primary key autoincrement,
        shelf_id text not null,
        product_id text not null,
        change_type text not null,
        quantity_before integer,
        quantity_after integer,
        timestamp text not null
      );

      create index if not exists idx_device_id on sensor_data(device_id);
      create index if not exists idx_shelf_id on sensor_data(shelf_id);
      create index if not exists idx_timestamp on sensor_data(timestamp);
      create index if not exists idx_shelves_device on shelves(device_id);
      create index if not exists idx_shelves_product on shelves(product_id);
      create index if not exists idx_stock_changes_shelf on stock_changes(shelf_id);
    `);
  }

  private stamp(): string {
    return this.now().toISOString();
  }

  private count(sql: string, ...params: string[]): number {
    const row = this.db.prepare<string[], { n: number | null }>(sql).get(...params);
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }

  // ---------- devices ----------

  registerDevice(deviceId: string, opts: { deviceName?: string | null; location?: string | null } = {}): void {
    const ts = this.stamp();
    this.db
      .prepare<[string, string, string | null, string, string, string | null, string | null]>(
        `insert into devices (device_id, device_name, location, status, last_seen, created_at)
         values (?, ?, ?, 'online', ?, ?)
         on conflict(device_id) do update set
           device_name = coalesce(?, device_name),
           location = coalesce(?, location),
           status = 'online',
           last_seen = excluded.last_seen`,
      )
      .run(
        deviceId,
        opts.deviceName ?? deviceId,
        opts.location ?? null,
        ts,
        ts,
        opts.deviceName ?? null,
        opts.location ?? null,
      );
  }

  /** Console registration; a device picked from a discovery scan starts out online. */
  addDevice(input: NewDevice): Device {
    const ts = this.stamp();

    try {
      this.db
        .prepare<[string, string, string | null, DeviceStatus, string, string]>(
          `insert into devices (device_id, device_name, location, status, last_seen, created_at)
           values (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.deviceId,
          input.deviceName,
          input.location || null,
          input.fromDiscovery ? 'online' : 'offline',
          ts,
          ts,
        );
    } catch (error) {
      if (isConstraintError(error)) {
        throw new StoreConflictError(`Device ${input.deviceId} already exists`);
      }
      throw error;
    }

    const device = this.getDevice(input.deviceId);
    if (!device) throw new Error(`Device ${input.deviceId} vanished after insert`);
    return device;
  }

  touchDevice(deviceId: string): void {
    this.db
      .prepare<[string, string]>(`update devices set last_seen = ?, status = 'online' where device_id = ?`)
      .run(this.stamp(), deviceId);
  }

  setDeviceStatus(deviceId: string, status: DeviceStatus, lastSeen?: string): void {
    if (lastSeen) {
      this.db
        .prepare<[string, string, string]>(`update devices set status = ?, last_seen = ? where device_id = ?`)
        .run(status, lastSeen, deviceId);
    } else {
      this.db.prepare<[string, string]>(`update devices set status = ? where device_id = ?`).run(status, deviceId);
    }
  }

  updateDevice(deviceId: string, fields: { deviceName?: string; location?: string | null }): boolean {
    const current = this.getDevice(deviceId);
    if (!current) return false;

    this.db
      .prepare<[string, string | null, string]>(`update devices set device_name = ?, location = ? where device_id = ?`)
      .run(
        fields.deviceName ?? current.deviceName,
        fields.location === undefined ? current.location : fields.location || null,
        deviceId,
      );
    return true;
  }

  getDevice(deviceId: string): Device | null {
    const row = this.db.prepare<[string], DeviceRow>(`select * from devices where device_id = ?`).get(deviceId);
    return row ? toDevice(row) : null;
  }

  listDevices(): DeviceListing[] {
    return this.db
      .prepare<[], DeviceRow & { shelf_count: number }>(
        `select d.*, count(s.shelf_id) as shelf_count
         from devices d
         left join shelves s on d.device_id = s.device_id
         group by d.device_id
         order by d.device_id`,
      )
      .all()
      .map((row) => ({ ...toDevice(row), shelfCount: row.shelf_count }));
  }

  listDeviceIds(): string[] {
    return this.db
      .prepare<[], { device_id: string }>(`select device_id from devices order by device_id`)
      .all()
      .map((row) => row.device_id);
  }

  listUnassignedDevices(): Device[] {
    return this.db
      .prepare<[], DeviceRow>(
        `select * from devices where location is null or location = '' order by last_seen desc, device_id`,
      )
      .all()
      .map(toDevice);
  }

  deleteDevice(deviceId: string): boolean {
    return this.db.prepare<[string]>(`delete from devices where device_id = ?`).run(deviceId).changes > 0;
  }

  // ---------- products ----------

  addProduct(input: NewProduct): Product {
    const ts = this.stamp();

    const insert = this.db.transaction(() => {
      this.db
        .prepare<[string, string, number, string | null, string]>(
          `insert into products (product_id, product_name, product_length, description, created_at)
           values (?, ?, ?, ?, ?)`,
        )
        .run(input.productId, input.productName, input.productLength, input.description || null, ts);

      if (input.shelfId) {
        const bound = this.db
          .prepare<[string, string, number, number, string, string]>(
            `update shelves
             set product_id = ?, product_name = ?, product_length = ?, stock_quantity = ?, updated_at = ?
             where shelf_id = ?`,
          )
          .run(input.productId, input.productName, input.productLength, input.stockQuantity ?? 0, ts, input.shelfId);
        if (bound.changes === 0) {
          throw new StoreNotFoundError(`Shelf ${input.shelfId} not found`);
        }
      }
    });

    try {
      insert();
    } catch (error) {
      if (isConstraintError(error)) {
        throw new StoreConflictError(`Product ${input.productId} already exists`);
      }
      throw error;
    }

    const product = this.getProduct(input.productId);
    if (!product) throw new Error(`Product ${input.productId} vanished after insert`);
    return product;
  }

  getProduct(productId: string): Product | null {
    const row = this.db.prepare<[string], ProductRow>(`select * from products where product_id = ?`).get(productId);
    return row ? toProduct(row) : null;
  }

  listProducts(): ProductListing[] {
    return this.db
      .prepare<
        [],
        ProductRow & {
          shelf_id: string | null;
          stock_quantity: number | null;
          area_location: string | null;
          device_name: string | null;
        }
      >(
        `select p.*, s.shelf_id, s.stock_quantity, d.location as area_location, d.device_name
         from products p
         left join shelves s on p.product_id = s.product_id
         left join devices d on s.device_id = d.device_id
         order by p.product_id, s.shelf_id`,
      )
      .all()
      .map((row) => ({
        ...toProduct(row),
        shelfId: row.shelf_id,
        stockQuantity: row.stock_quantity,
        location: row.area_location,
        deviceName: row.device_name,
      }));
  }

  deleteProduct(productId: string): boolean {
    return this.db.prepare<[string]>(`delete from products where product_id = ?`).run(productId).changes > 0;
  }

  // ---------- shelves ----------

  registerShelf(input: NewShelf): void {
    const ts = this.stamp();
    this.db
      .prepare<
        [string, string, string | null, string | null, number | null, number, number, number | null, string, string]
      >(
        `insert into shelves
         (shelf_id, device_id, product_id, product_name, product_length,
          max_distance, stock_quantity, position_index, created_at, updated_at)
         values (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         on conflict(shelf_id) do update set
           device_id = excluded.device_id,
           product_id = excluded.product_id,
           product_name = excluded.product_name,
           product_length = excluded.product_length,
           max_distance = excluded.max_distance,
           stock_quantity = excluded.stock_quantity,
           position_index = excluded.position_index,
           updated_at = excluded.updated_at`,
      )
      .run(
        input.shelfId,
        input.deviceId,
        input.productId ?? null,
        input.productName ?? null,
        input.productLength ?? null,
        input.maxDistance,
        input.stockQuantity ?? 0,
        input.positionIndex ?? null,
        ts,
        ts,
      );
  }

  addShelf(input: NewShelf): Shelf {
    const product = input.productId ? this.getProduct(input.productId) : null;
    const ts = this.stamp();

    try {
      this.db
        .prepare<
          [string, string, string | null, string | null, number | null, number, number, number, string, string]
        >(
          `insert into shelves
           (shelf_id, device_id, product_id, product_name, product_length,
            max_distance, stock_quantity, position_index, created_at, updated_at)
           values (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.shelfId,
          input.deviceId,
          input.productId || null,
          product?.productName ?? null,
          product?.productLength ?? null,
          input.maxDistance,
          input.stockQuantity ?? 0,
          input.positionIndex ?? 0,
          ts,
          ts,
        );
    } catch (error) {
      if (isConstraintError(error)) {
        throw new StoreConflictError(`Shelf ${input.shelfId} already exists`);
      }
      throw error;
    }

    const shelf = this.getShelf(input.shelfId);
    if (!shelf) throw new Error(`Shelf ${input.shelfId} vanished after insert`);
    return shelf;
  }

  getShelf(shelfId: string): Shelf | null {
    const row = this.db.prepare<[string], ShelfRow>(`select * from shelves where shelf_id = ?`).get(shelfId);
    return row ? toShelf(row) : null;
  }

  listShelves(deviceId?: string): ShelfListing[] {
    type Row = ShelfRow & { device_name: string | null; location: string | null };
    const base = `select s.*, d.device_name, d.location
                  from shelves s
                  left join devices d on s.device_id = d.device_id`;

    const rows = deviceId
      ? this.db
          .prepare<[string], Row>(`${base} where s.device_id = ? order by s.position_index, s.shelf_id`)
          .all(deviceId)
      : this.db.prepare<[], Row>(`${base} order by s.device_id, s.position_index, s.shelf_id`).all();

    return rows.map((row) => ({ ...toShelf(row), deviceName: row.device_name, location: row.location }));
  }

  listAvailableShelves(location: string): ShelfListing[] {
    return this.db
      .prepare<[string], ShelfRow & { device_name: string | null; location: string | null }>(
        `select s.*, d.device_name, d.location
         from shelves s
         join devices d on s.device_id = d.device_id
         where d.location = ?
           and (s.product_id is null or s.product_id = '')
           and s.enabled = 1
         order by s.position_index, s.shelf_id`,
      )
      .all(location)
      .map((row) => ({ ...toShelf(row), deviceName: row.device_name, location: row.location }));
  }

  deleteShelf(shelfId: string): boolean {
    return this.db.prepare<[string]>(`delete from shelves where shelf_id = ?`).run(shelfId).changes > 0;
  }

  updateShelfCalibration(shelfId: string, shelfLength: number): boolean {
    return (
      this.db
        .prepare<[number, string, string]>(`update shelves set shelf_length = ?, updated_at = ? where shelf_id = ?`)
        .run(shelfLength, this.stamp(), shelfId).changes > 0
    );
  }

  setShelfEnabled(shelfId: string, enabled: boolean): boolean {
    return (
      this.db
        .prepare<[number, string, string]>(`update shelves set enabled = ?, updated_at = ? where shelf_id = ?`)
        .run(enabled ? 1 : 0, this.stamp(), shelfId).changes > 0
    );
  }

  /** Mirrors a controller's own view of its shelves into the table; unknown shelves are created. */
  applyDeviceShelfConfig(deviceId: string, entries: ShelfConfigEntry[]): number {
    const ts = this.stamp();

    const apply = this.db.transaction((items: ShelfConfigEntry[]) => {
      for (const entry of items) {
        const existing = this.getShelf(entry.shelf_id);
        const enabled = entry.enabled ? 1 : 0;
        const connected = entry.sensor_connected ? 1 : 0;

        if (existing) {
          this.db
            .prepare<[string, number, number, number, number | null, number | null, string, string]>(
              `update shelves set
                 device_id = ?,
                 enabled = ?,
                 sensor_connected = ?,
                 shelf_length = ?,
                 gpio = coalesce(?, gpio),
                 position_index = coalesce(?, position_index),
                 updated_at = ?
               where shelf_id = ?`,
            )
            .run(
              deviceId,
              enabled,
              connected,
              entry.shelf_length ?? existing.shelfLength,
              entry.gpio ?? null,
              entry.index ?? null,
              ts,
              entry.shelf_id,
            );
          continue;
        }

        const shelfLength = entry.shelf_length ?? 0;
        const fallback = Object.prototype.hasOwnProperty.call(this.shelfDefaults, entry.shelf_id)
          ? this.shelfDefaults[entry.shelf_id]
          : 0;
        const maxDistance = shelfLength > 0 ? shelfLength : fallback;

        this.db
          .prepare<[string, string, number, number, number, number, number | null, number, string, string]>(
            `insert into shelves
             (shelf_id, device_id, max_distance, shelf_length, sensor_connected, enabled,
              gpio, position_index, created_at, updated_at)
             values (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(
            entry.shelf_id,
            deviceId,
            maxDistance,
            shelfLength,
            connected,
            enabled,
            entry.gpio ?? null,
            entry.index ?? positionFromShelfId(entry.shelf_id),
            ts,
            ts,
          );
      }
      return items.length;
    });

    return apply(entries);
  }

  // ---------- stock ----------

  updateStockQuantity(shelfId: string, newQuantity: number, changeType = 'manual'): boolean {
    const ts = this.stamp();

    const update = this.db.transaction(() => {
      const current = this.db
        .prepare<[string], { stock_quantity: number | null; product_id: string | null }>(
          `select stock_quantity, product_id from shelves where shelf_id = ?`,
        )
        .get(shelfId);
      if (!current) return false;

      this.db
        .prepare<[number, string, string]>(`update shelves set stock_quantity = ?, updated_at = ? where shelf_id = ?`)
        .run(newQuantity, ts, shelfId);

      if (current.product_id) {
        this.db
          .prepare<[string, string, string, number, number, string]>(
            `insert into stock_changes
             (shelf_id, product_id, change_type, quantity_before, quantity_after, timestamp)
             values (?, ?, ?, ?, ?, ?)`,
          )
          .run(shelfId, current.product_id, changeType, current.stock_quantity ?? 0, newQuantity, ts);
      }
      return true;
    });

    return update();
  }

  listStockChanges(shelfId: string): Array<{
    productId: string;
    changeType: string;
    quantityBefore: number | null;
    quantityAfter: number | null;
    timestamp: string;
  }> {
    return this.db
      .prepare<
        [string],
        {
          product_id: string;
          change_type: string;
          quantity_before: number | null;
          quantity_after: number | null;
          timestamp: string;
        }
      >(`select * from stock_changes where shelf_id = ? order by id`)
      .all(shelfId)
      .map((row) => ({
        productId: row.product_id,
        changeType: row.change_type,
        quantityBefore: row.quantity_before,
        quantityAfter: row.quantity_after,
        timestamp: row.timestamp,
      }));
  }

  stockSummary(): StockSummaryItem[] {
    return this.db
      .prepare<
        [],
        {
          product_id: string;
          product_name: string | null;
          product_length: number | null;
          shelf_count: number;
          total_stock: number | null;
        }
      >(
        `select product_id, product_name, product_length,
                count(*) as shelf_count, sum(stock_quantity) as total_stock
         from shelves
         where product_id is not null
         group by product_id
         order by product_name`,
      )
      .all()
      .map((row) => ({
        productId: row.product_id,
        productName: row.product_name,
        productLength: row.product_length,
        shelfCount: row.shelf_count,
        totalStock: row.total_stock ?? 0,
      }));
  }

  // ---------- sensor data ----------

  saveSensorData(deviceId: string, shelfId: string, distanceCm: number, occupied: boolean, fillPercent: number): void {
    this.db
      .prepare<[string, string, number, number, number, string]>(
        `insert into sensor_data (device_id, shelf_id, distance_cm, occupied, fill_percent, timestamp)
         values (?, ?, ?, ?, ?, ?)`,
      )
      .run(deviceId, shelfId, distanceCm, occupied ? 1 : 0, fillPercent, this.stamp());

    this.touchDevice(deviceId);
  }

  querySensorData(filter: { deviceId?: string; shelfId?: string; limit?: number } = {}): SensorRecord[] {
    const where: string[] = [];
    const values: Array<string | number> = [];

    if (filter.deviceId) {
      where.push('device_id = ?');
      values.push(filter.deviceId);
    }
    if (filter.shelfId) {
      where.push('shelf_id = ?');
      values.push(filter.shelfId);
    }
    values.push(filter.limit ?? 50);

    const clause = where.length ? `where ${where.join(' and ')}` : '';
    return this.db
      .prepare<Array<string | number>, SensorRow>(
        `select * from sensor_data ${clause} order by timestamp desc, id desc limit ?`,
      )
      .all(...values)
      .map(toSensorRecord);
  }

  distinctSensorSources(): { devices: string[]; shelves: string[] } {
    return {
      devices: this.db
        .prepare<[], { device_id: string }>(`select distinct device_id from sensor_data order by device_id`)
        .all()
        .map((row) => row.device_id),
      shelves: this.db
        .prepare<[], { shelf_id: string }>(`select distinct shelf_id from sensor_data order by shelf_id`)
        .all()
        .map((row) => row.shelf_id),
    };
  }

  // ---------- statistics ----------

  stats(): StoreStats {
    const dataCount = this.count(`select count(*) as n from sensor_data`);
    const occupiedCount = this.count(`select count(*) as n from sensor_data where occupied = 1`);

    return {
      deviceCount: this.count(`select count(*) as n from devices`),
      onlineDevices: this.count(`select count(*) as n from devices where status = 'online'`),
      shelfCount: this.count(`select count(*) as n from shelves`),
      shelvesWithProducts: this.count(`select count(*) as n from shelves where product_id is not null`),
      productCount: this.count(`select count(*) as n from products`),
      totalStock: this.count(`select sum(stock_quantity) as n from shelves`),
      dataCount,
      occupiedCount,
      occupancyRate: dataCount > 0 ? (occupiedCount / dataCount) * 100 : 0,
    };
  }

  // ---------- retention ----------

  cleanOldSensorData(keepDays = 7, keepMinRecords = 1000): RetentionResult {
    const before = this.count(`select count(*) as n from sensor_data`);
    if (before <= keepMinRecords) {
      return { before, after: before, deleted: 0 };
    }

    const cutoff = new Date(this.now().getTime() - keepDays * 24 * 60 * 60 * 1000).toISOString();
    const stale = this.count(`select count(*) as n from sensor_data where timestamp < ?`, cutoff);

    if (before - stale < keepMinRecords) {
      this.db
        .prepare<[number]>(
          `delete from sensor_data where id in (
             select id from sensor_data order by timestamp asc, id asc limit ?
           )`,
        )
        .run(before - keepMinRecords);
    } else {
      this.db.prepare<[string]>(`delete from sensor_data where timestamp < ?`).run(cutoff);
    }

    const after = this.count(`select count(*) as n from sensor_data`);
    if (after < before) this.db.exec('vacuum');

    return { before, after, deleted: before - after };
  }

  // ---------- seeding ----------

  hasDevices(): boolean {
    return this.count(`select count(*) as n from devices`) > 0;
  }

  seedDefaults(controllerId: string, controllerName: string, location: string): number {
    const seed = this.db.transaction(() => {
      this.registerDevice(controllerId, { deviceName: controllerName, location });
      const entries = Object.entries(this.shelfDefaults);
      for (const [shelfId, maxDistance] of entries) {
        this.registerShelf({
          shelfId,
          deviceId: controllerId,
          maxDistance,
          positionIndex: positionFromShelfId(shelfId),
        });
      }
      return entries.length;
    });
    return seed();
  }
}
