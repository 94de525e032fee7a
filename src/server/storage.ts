/**
 * Artifact storage adapter - switches between local disk (dev) and Supabase Storage (prod).
 *
 * Artifacts are opaque blobs (original theme files and rendered previews)
 * addressed by the ref returned from `put`. Refs are what the database stores.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import path from 'path';
import fs from 'fs/promises';
import type { Config } from '../lib/config';
import { NotFoundError } from './errors';

// =============================================================================
// Storage interface
// =============================================================================

export interface ArtifactStore {
  readonly kind: 'local' | 'supabase';
  /** Store bytes under `key`; returns the ref to persist. */
  put(key: string, bytes: Uint8Array, contentType: string): Promise<string>;
  /** Throws NotFoundError when nothing is stored under `ref`. */
  get(ref: string): Promise<Buffer>;
  /** Idempotent. */
  delete(ref: string): Promise<void>;
}

export type ArtifactFolder = 'themes' | 'previews';

/**
 * Generate a unique key for a new artifact.
 * Keys are never derived from content, so two drafts of the same file cannot
 * clobber each other before dedup settles.
 */
export function generateArtifactKey(folder: ArtifactFolder, extension: string): string {
  const ext = extension && !extension.startsWith('.') ? `.${extension}` : extension;
  return `${folder}/${uuidv4()}${ext.toLowerCase()}`;
}

const KEY_PATTERN = /^[A-Za-z0-9_-]+(\/[A-Za-z0-9_.-]+)*$/;

function assertValidKey(key: string): void {
  if (!KEY_PATTERN.test(key) || key.split('/').some(part => part === '..' || part === '.')) {
    throw new Error(`Invalid artifact key: ${key}`);
  }
}

// =============================================================================
// Local disk storage (development)
// =============================================================================

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class LocalArtifactStore implements ArtifactStore {
  readonly kind = 'local';
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = path.resolve(rootDir);
  }

  private resolve(ref: string): string {
    assertValidKey(ref);
    const filePath = path.resolve(this.root, ref);
    if (!filePath.startsWith(this.root + path.sep)) {
      throw new Error(`Artifact ref escapes storage root: ${ref}`);
    }
    return filePath;
  }

  async put(key: string, bytes: Uint8Array, _contentType: string): Promise<string> {
    const filePath = this.resolve(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    // wx: never overwrite an existing artifact
    await fs.writeFile(filePath, bytes, { flag: 'wx' });
    return key;
  }

  async get(ref: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolve(ref));
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        throw new NotFoundError('Artifact');
      }
      throw err;
    }
  }

  async delete(ref: string): Promise<void> {
    await fs.rm(this.resolve(ref), { force: true });
  }
}

// =============================================================================
// Supabase Storage (production)
// =============================================================================

export class SupabaseArtifactStore implements ArtifactStore {
  readonly kind = 'supabase';
  private bucketReady: Promise<void> | null = null;

  constructor(
    private readonly client: SupabaseClient,
    private readonly bucket: string
  ) {}

  /** Create the bucket on first write if it doesn't exist. Private: themes can be private. */
  private ensureBucket(): Promise<void> {
    if (!this.bucketReady) {
      this.bucketReady = (async () => {
        const { data: buckets, error: listError } = await this.client.storage.listBuckets();
        if (listError) {
          throw new Error(`Failed to list storage buckets: ${listError.message}`);
        }
        if (buckets?.some(b => b.name === this.bucket)) return;

        const { error: createError } = await this.client.storage.createBucket(this.bucket, { public: false });
        if (createError) {
          if (createError.message.includes('row-level security') || createError.message.includes('policy')) {
            throw new Error('Storage permission denied. Ensure SUPABASE_SERVICE_KEY is the service_role key (not anon key).');
          }
          throw new Error(`Bucket creation failed: ${createError.message}`);
        }
        console.log(`[storage] created bucket: ${this.bucket}`);
      })();
      // Let a later write retry after a failed bucket check
      this.bucketReady.catch(() => {
        this.bucketReady = null;
      });
    }
    return this.bucketReady;
  }

  async put(key: string, bytes: Uint8Array, contentType: string): Promise<string> {
    assertValidKey(key);
    await this.ensureBucket();

    const { error } = await this.client.storage
      .from(this.bucket)
      .upload(key, bytes, { contentType, upsert: false });

    if (error) {
      console.error('[storage] Supabase upload error:', error.message);
      throw new Error(`Artifact upload failed: ${error.message}`);
    }
    return key;
  }

  async get(ref: string): Promise<Buffer> {
    const { data, error } = await this.client.storage.from(this.bucket).download(ref);
    if (error || !data) {
      throw new NotFoundError('Artifact');
    }
    return Buffer.from(await data.arrayBuffer());
  }

  async delete(ref: string): Promise<void> {
    const { error } = await this.client.storage.from(this.bucket).remove([ref]);
    if (error) {
      throw new Error(`Artifact delete failed: ${error.message}`);
    }
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Check if we're using Supabase storage (production).
 */
export function isUsingSupabase(config: Pick<Config, 'supabaseUrl' | 'supabaseServiceKey'>): boolean {
  return !!(config.supabaseUrl && config.supabaseServiceKey);
}

/**
 * Uses Supabase when configured, local disk otherwise.
 */
export function createArtifactStore(
  config: Pick<Config, 'supabaseUrl' | 'supabaseServiceKey' | 'supabaseStorageBucket' | 'artifactsDir'>
): ArtifactStore {
  if (isUsingSupabase(config)) {
    const client = createClient(config.supabaseUrl, config.supabaseServiceKey, {
      auth: { persistSession: false },
    });
    return new SupabaseArtifactStore(client, config.supabaseStorageBucket);
  }
  return new LocalArtifactStore(config.artifactsDir);
}

/**
 * Best-effort delete for cleanup paths. Failures are logged, not thrown.
 */
export async function discardArtifacts(store: ArtifactStore, refs: Array<string | null | undefined>): Promise<void> {
  for (const ref of refs) {
    if (!ref) continue;
    try {
      await store.delete(ref);
    } catch (err) {
      console.error(`[storage] failed to delete artifact ${ref}:`, err);
    }
  }
}
