import * as admin from 'firebase-admin';
import * as path from 'path';

export type Firestore = ReturnType<typeof admin.firestore>;
export type RealtimeDatabase = ReturnType<typeof admin.database>;

export interface FirebaseHandles {
  db: Firestore;
  rtdb: RealtimeDatabase;
}

// Firebase is optional: without a service account the hub runs on SQLite alone.
export function initFirebase(serviceAccountPath: string | null, databaseURL: string | null): FirebaseHandles | null {
  if (!serviceAccountPath || !databaseURL) {
    console.log('Firebase mirror disabled (no service account configured)');
    return null;
  }

  if (!admin.apps.length) {
    try {
      admin.initializeApp({
        credential: admin.credential.cert(path.resolve(serviceAccountPath)),
        databaseURL,
      });
      console.log('Firebase Admin Initialized');
    } catch (error) {
      console.error('Firebase Admin Initialization Error:', error);
      return null;
    }
  }

  return { db: admin.firestore(), rtdb: admin.database() };
}
