import type { AnalysisResult } from '../../../types';
import type { FirebaseHandles } from './firebase';

export interface LevelSnapshot extends AnalysisResult {
  deviceId: string;
  distanceCm: number;
  estimatedCount: number | null;
}

/** Live view for dashboards; the SQLite store stays the source of truth. */
export interface LiveMirror {
  publishLevel(shelfId: string, level: LevelSnapshot): Promise<void>;
  publishStatus(deviceId: string, online: boolean): Promise<void>;
}

export type HistoryStatus = 'COMPLETED' | 'ERROR';

export type HistoryItem = {
  timestamp: number;
  action: string;
  deviceId: string | null;
  shelfId: string | null;
  status: HistoryStatus;
  detail?: string;
};

export interface CommandHistory {
  record(item: HistoryItem): Promise<void>;
}

export function createFirebaseMirror({ rtdb }: FirebaseHandles): LiveMirror {
  return {
    async publishLevel(shelfId, level) {
      await rtdb.ref(`shelves/${shelfId}/level`).set({
        ...level,
        lastUpdated: Date.now(),
      });
    },
    async publishStatus(deviceId, online) {
      await rtdb.ref(`devices/${deviceId}/status`).set({
        online,
        lastChanged: Date.now(),
      });
    },
  };
}

export function createFirestoreHistory({ db }: FirebaseHandles): CommandHistory {
  return {
    async record(item) {
      await db.collection('history').add(item);
    },
  };
}

export async function recordHistory(history: CommandHistory | null, item: Omit<HistoryItem, 'timestamp'>) {
  if (!history) return;

  try {
    await history.record({ timestamp: Date.now(), ...item });
  } catch (error) {
    console.error('Failed to save history:', error);
  }
}
