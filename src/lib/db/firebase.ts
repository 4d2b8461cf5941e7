import admin from "firebase-admin";
import { z } from "zod";
import { getEnv } from "../../config/env";
import { ConfigurationError } from "../ai/core/errors";

const ServiceAccountSchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
  project_id: z.string(),
});

let db: admin.firestore.Firestore | null = null;

/**
 * Firestore handle, initialized on first use so that the memory-backed
 * configuration never needs credentials.
 */
export function getDb(): admin.firestore.Firestore {
  if (db) return db;

  const serviceAccountJson = getEnv().FIREBASE_SERVICE_ACCOUNT;
  if (!serviceAccountJson) {
    throw new ConfigurationError("Missing FIREBASE_SERVICE_ACCOUNT environment variable.");
  }
  const serviceAccount = ServiceAccountSchema.parse(JSON.parse(serviceAccountJson));

  // Check if the app already exists to avoid reinitialization error
  const app = admin.apps.length
    ? admin.app()
    : admin.initializeApp({
        credential: admin.credential.cert({
          clientEmail: serviceAccount.client_email,
          privateKey: serviceAccount.private_key,
          projectId: serviceAccount.project_id,
        }),
      });

  db = admin.firestore(app);
  db.settings({ ignoreUndefinedProperties: true });
  return db;
}
