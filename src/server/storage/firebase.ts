import admin from "firebase-admin";

// Credentials come from GOOGLE_APPLICATION_CREDENTIALS or the runtime's
// metadata server; FIRESTORE_EMULATOR_HOST is honoured by the SDK itself.
if (!admin.apps.length) {
  admin.initializeApp({
    credential: admin.credential.applicationDefault(),
    projectId: process.env.GOOGLE_CLOUD_PROJECT,
  });
}

export const db = admin.firestore();
