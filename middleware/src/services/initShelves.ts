import type { ShelfStore } from './database';

const DEFAULT_CONTROLLER = { id: 'CTRL_001', name: 'Shelf controller 1', location: 'Warehouse A' };

export const initializeShelves = (store: ShelfStore): boolean => {
  try {
    if (store.hasDevices()) {
      console.log('✔ Shelves already initialized.');
      return false;
    }

    console.log('Device table empty. Seeding default controller and shelves...');

    const count = store.seedDefaults(DEFAULT_CONTROLLER.id, DEFAULT_CONTROLLER.name, DEFAULT_CONTROLLER.location);
    console.log(`✔ Default controller ${DEFAULT_CONTROLLER.id} added with ${count} shelves.`);
    return true;
  } catch (error) {
    console.error('✘ Error initializing shelves:', error);
    return false;
  }
};
