/**
 * @file MongoDB connection and collection definitions for the core.
 * Unique indexes back the one-per-user and one-per-key invariants.
 */

import { MongoClient, type Collection, type Db, type IndexSpecification } from 'mongodb';
import { logger, errorMessage } from '../utils/logger';
import type { VaultDocument } from '../models/vault';
import type { UserSettings } from '../models/user';
import type { FeedbackDocument, RecommendationDocument } from '../models/recommendation';
import type { HintDocument } from '../services/embedding_store/models';
import type { NotificationDocument } from '../services/notification_scheduler/models';
import type { PreferenceWeightsDocument } from '../services/weight_learner/models';

let client: MongoClient | null = null;
let db: Db | null = null;

interface CollectionConfig {
  name: string;
  indexes: Array<{
    spec: IndexSpecification;
    options?: { unique?: boolean; sparse?: boolean; name?: string };
  }>;
}

export const COLLECTION_NAMES = {
  vaults: 'vaults',
  userSettings: 'user_settings',
  hints: 'hints',
  notifications: 'notifications',
  recommendations: 'recommendations',
  feedback: 'feedback',
  preferenceWeights: 'preference_weights',
} as const;

const CORE_COLLECTIONS: CollectionConfig[] = [
  {
    name: COLLECTION_NAMES.vaults,
    indexes: [
      { spec: { vaultId: 1 }, options: { unique: true } },
      // Exactly one vault per user
      { spec: { userId: 1 }, options: { unique: true } },
    ],
  },
  {
    name: COLLECTION_NAMES.userSettings,
    indexes: [{ spec: { userId: 1 }, options: { unique: true } }],
  },
  {
    name: COLLECTION_NAMES.hints,
    indexes: [
      { spec: { hintId: 1 }, options: { unique: true } },
      { spec: { vaultId: 1, isUsed: 1, createdAt: -1 } },
      // Backfill scan
      { spec: { embeddedAt: 1, createdAt: 1 } },
    ],
  },
  {
    name: COLLECTION_NAMES.notifications,
    indexes: [
      { spec: { notificationId: 1 }, options: { unique: true } },
      // Idempotency key
      {
        spec: { userId: 1, milestoneId: 1, daysBefore: 1, occurrenceDate: 1, milestoneRevision: 1 },
        options: { unique: true, name: 'notification_key' },
      },
      // Delivery worker
      { spec: { status: 1, scheduledFor: 1 } },
      { spec: { status: 1, claimedAt: 1 } },
      // History
      { spec: { userId: 1, scheduledFor: -1 } },
      { spec: { vaultId: 1, status: 1 } },
    ],
  },
  {
    name: COLLECTION_NAMES.recommendations,
    indexes: [
      { spec: { recommendationId: 1 }, options: { unique: true } },
      { spec: { vaultId: 1, createdAt: -1 } },
      { spec: { notificationId: 1 }, options: { sparse: true } },
    ],
  },
  {
    name: COLLECTION_NAMES.feedback,
    indexes: [
      { spec: { feedbackId: 1 }, options: { unique: true } },
      { spec: { userId: 1, createdAt: 1 } },
      { spec: { recommendationId: 1 } },
    ],
  },
  {
    name: COLLECTION_NAMES.preferenceWeights,
    indexes: [
      // One snapshot per user
      { spec: { userId: 1 }, options: { unique: true } },
    ],
  },
];

/**
 * Connect and remember the database handle.
 */
export async function connectDatabase(uri: string, dbName: string): Promise<Db> {
  if (db) return db;

  client = new MongoClient(uri, {
    serverSelectionTimeoutMS: 10_000,
    socketTimeoutMS: 30_000,
    ignoreUndefined: true,
  });
  await client.connect();
  db = client.db(dbName);
  logger.info(`[Database] Connected to ${dbName}`);
  return db;
}

export function getDatabase(): Db {
  if (!db) {
    throw new Error('Database not initialized. Call connectDatabase first.');
  }
  return db;
}

export async function closeDatabase(): Promise<void> {
  if (client) {
    await client.close();
    logger.info('[Database] Connection closed');
  }
  client = null;
  db = null;
}

/**
 * Create collections and indexes. Safe to run on every start.
 */
export async function setupCoreDatabase(database: Db = getDatabase()): Promise<void> {
  for (const collection of CORE_COLLECTIONS) {
    await ensureCollection(database, collection);
  }
  logger.info('[Database] All core collections and indexes ready');
}

async function ensureCollection(database: Db, config: CollectionConfig): Promise<void> {
  const existing = await database.listCollections({ name: config.name }).toArray();
  if (existing.length === 0) {
    await database.createCollection(config.name);
    logger.info(`[Database] Created collection: ${config.name}`);
  }

  const collection = database.collection(config.name);
  for (const index of config.indexes) {
    try {
      await collection.createIndex(index.spec, index.options ?? {});
    } catch (error) {
      // 85/86: an equivalent index exists under different options
      if (!hasCode(error, 85) && !hasCode(error, 86)) {
        throw error;
      }
      logger.warn(`[Database] Index on ${config.name} kept as-is: ${errorMessage(error)}`);
    }
  }
}

function hasCode(error: unknown, code: number): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export function getCollection<T extends object>(name: string): Collection<T> {
  return getDatabase().collection<T>(name);
}

// Typed collection getters
export const collections = {
  vaults: () => getCollection<VaultDocument>(COLLECTION_NAMES.vaults),
  userSettings: () => getCollection<UserSettings>(COLLECTION_NAMES.userSettings),
  hints: () => getCollection<HintDocument>(COLLECTION_NAMES.hints),
  notifications: () => getCollection<NotificationDocument>(COLLECTION_NAMES.notifications),
  recommendations: () => getCollection<RecommendationDocument>(COLLECTION_NAMES.recommendations),
  feedback: () => getCollection<FeedbackDocument>(COLLECTION_NAMES.feedback),
  preferenceWeights: () => getCollection<PreferenceWeightsDocument>(COLLECTION_NAMES.preferenceWeights),
};
