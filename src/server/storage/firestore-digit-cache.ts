import type { Firestore } from "firebase-admin/firestore";
import { db } from "./firebase";
import type { DigitCache } from "./digit-cache";
import { createLogger, logError, type Logger } from "../utils/logger";

/* ────────────────────────────────────────────────────────────── */
/*  Firestore collection layout                                   */
/*    digits/                                                     */
/*      ├─ 0          { digits: "141592653" }                     */
/*      ├─ 9          { digits: "589793238" }                     */
/*      ├─ 12         { digits: "462643383" }   (offset 18)       */
/*      └─ …                                                      */
/*  Document id is the hex block offset; one document per block. */
/* ────────────────────────────────────────────────────────────── */

export const DEFAULT_FIRESTORE_COLLECTION = "digits";

interface DigitDocument {
  digits: string;
}

const isDigitDocument = (data: unknown): data is DigitDocument =>
  typeof data === "object" && data !== null && "digits" in data && typeof data.digits === "string";

export const DEFAULT_FIRESTORE_TIMEOUT_MS = 5_000;

/**
 * Settles with the result of `work`, or rejects once `timeoutMs` elapses or `signal` aborts
 * (with the signal's reason). The Firestore call itself keeps running.
 */
function guard<T>(work: () => Promise<T>, timeoutMs: number, signal?: AbortSignal): Promise<T> {
  if (signal?.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      reject(new Error(`Firestore call exceeded ${timeoutMs}ms`));
    }, timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });

    const settle = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };
    work().then(
      value => {
        settle();
        resolve(value);
      },
      (error: unknown) => {
        settle();
        reject(error);
      },
    );
  });
}

export interface FirestoreDigitCacheOptions {
  collection?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export class FirestoreDigitCache implements DigitCache {
  readonly name = "firestore";

  private readonly collection: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly firestore: Firestore, options: FirestoreDigitCacheOptions = {}) {
    this.collection = options.collection ?? DEFAULT_FIRESTORE_COLLECTION;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FIRESTORE_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("firestore-cache");
    this.logger.info({
      collection: this.collection,
      timeoutMs: this.timeoutMs,
    }, "FirestoreDigitCache constructed");
  }

  /** Build a cache on the process-wide Firebase app. */
  static create(options: FirestoreDigitCacheOptions = {}): FirestoreDigitCache {
    return new FirestoreDigitCache(db, options);
  }

  async getValue(key: string, signal?: AbortSignal): Promise<string> {
    try {
      const snap = await guard(() => this.firestore.collection(this.collection).doc(key).get(), this.timeoutMs, signal);
      const data: unknown = snap.exists ? snap.data() : undefined;
      if (!isDigitDocument(data)) {
        this.logger.trace({ key }, "Value is not cached");
        return "";
      }
      this.logger.trace({ key, value: data.digits }, "Cache hit");
      return data.digits;
    } catch (error) {
      logError(this.logger, error, { context: "firestore-get", key });
      throw error;
    }
  }

  async setValue(key: string, value: string, signal?: AbortSignal): Promise<void> {
    const document: DigitDocument = { digits: value };
    try {
      await guard(() => this.firestore.collection(this.collection).doc(key).set(document), this.timeoutMs, signal);
      this.logger.trace({ key, value }, "Block stored");
    } catch (error) {
      logError(this.logger, error, { context: "firestore-set", key });
      throw error;
    }
  }
}
