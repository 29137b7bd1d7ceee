import { z } from 'zod';
import { Artist, CacheToken, RELEASE_KINDS, Release, UpdateState } from './index';

export const artistSchema: z.ZodType<Artist> = z.object({
  id: z.string(),
  name: z.string(),
  genres: z.array(z.string()),
  cachedAt: z.string(),
});

export const releaseSchema: z.ZodType<Release> = z.object({
  id: z.string(),
  artistId: z.string(),
  kind: z.enum(RELEASE_KINDS),
  releaseDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  title: z.string(),
  artists: z.array(z.string()),
});

export const updateStateSchema: z.ZodType<UpdateState> = z.object({
  kind: z.string(),
  cursor: z.string().nullable(),
  processedIds: z.array(z.string()),
  totalCount: z.number().nullable(),
  startedAt: z.string(),
  updatedAt: z.string(),
  status: z.enum(['in_progress', 'completed', 'failed']),
  lastError: z.string().optional(),
});

export const cacheTokenSchema: z.ZodType<CacheToken> = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  scope: z.string(),
  expiresAt: z.number(),
});

/**
 * Value types for each record kind held by the local store
 */
export interface StoreSchema {
  artists: Artist;
  releases: Release[];
  state: UpdateState;
  token: CacheToken;
}

export type StoreKind = keyof StoreSchema;

export const storeSchemas: { [K in StoreKind]: z.ZodType<StoreSchema[K]> } = {
  artists: artistSchema,
  releases: z.array(releaseSchema),
  state: updateStateSchema,
  token: cacheTokenSchema,
};
