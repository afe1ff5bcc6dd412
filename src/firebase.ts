import admin from "firebase-admin";
import type { Firestore } from "firebase-admin/firestore";
import fs from "node:fs";
import { z } from "zod";
import { appConfig } from "./config.js";

const serviceAccountSchema = z
  .object({ project_id: z.string(), client_email: z.string(), private_key: z.string() })
  .transform((v) => ({ projectId: v.project_id, clientEmail: v.client_email, privateKey: v.private_key }));

function initializeFirebaseAdmin(): admin.app.App | null {
  if (admin.apps.length) {
    return admin.app();
  }

  let credential: admin.credential.Credential | undefined;

  if (appConfig.FIREBASE_SERVICE_ACCOUNT_JSON) {
    const account = serviceAccountSchema.parse(JSON.parse(appConfig.FIREBASE_SERVICE_ACCOUNT_JSON));
    credential = admin.credential.cert(account);
  } else if (appConfig.GOOGLE_APPLICATION_CREDENTIALS) {
    const p = appConfig.GOOGLE_APPLICATION_CREDENTIALS;
    if (!fs.existsSync(p)) {
      throw new Error(`GOOGLE_APPLICATION_CREDENTIALS not found at: ${p}`);
    }
    credential = admin.credential.cert(p);
  } else {
    // No Firebase configured; allow fallback to filesystem
    return null;
  }

  return admin.initializeApp({
    credential,
  });
}

export const firebaseApp = initializeFirebaseAdmin();
export const firestore: Firestore | null = firebaseApp ? admin.firestore(firebaseApp) : null;
