/**
 * Registry Manifest Model
 *
 * Persisted beside the vectors; its presence marks a registry as built,
 * even when it currently holds no identities.
 */

import { z } from 'zod';

export interface RegistryManifest {
  /** Dimension every stored vector shares; null until the first vector */
  dimension: number | null;
  /** Incremented on every successful mutation */
  version: number;
  /** ISO 8601 timestamp of the last mutation */
  updatedAt: string;
}

export const RegistryManifestSchema = z.object({
  dimension: z.number().int().positive().nullable(),
  version: z.number().int().nonnegative(),
  updatedAt: z.string(),
});

/**
 * Stored registry entry
 */
export interface StoredEmbedding {
  vector: number[];
  updatedAt: string;
}

export const StoredEmbeddingSchema = z.object({
  vector: z.array(z.number()),
  updatedAt: z.string(),
});
