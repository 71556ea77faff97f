import type { Shelf, ShelfGeometry } from '../../../types';
import type { ShelfDefaults } from '../config';

export interface ShelfRecordSource {
  getShelf(shelfId: string): Shelf | null;
}

export interface ShelfGeometryResolver {
  resolve(shelfId: string): ShelfGeometry | null;
}

// Calibrated shelf length wins over the configured max distance once it has been measured.
export function geometryFromShelf(shelf: Shelf): ShelfGeometry {
  return {
    maxDistance: shelf.shelfLength > 0 ? shelf.shelfLength : shelf.maxDistance,
    productLength: shelf.productLength,
  };
}

export function createGeometryResolver(source: ShelfRecordSource, defaults: ShelfDefaults): ShelfGeometryResolver {
  return {
    resolve(shelfId) {
      const shelf = source.getShelf(shelfId);
      if (shelf) return geometryFromShelf(shelf);

      if (Object.prototype.hasOwnProperty.call(defaults, shelfId)) {
        return { maxDistance: defaults[shelfId], productLength: null };
      }

      return null;
    },
  };
}
