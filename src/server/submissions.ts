/**
 * Theme submission dialog.
 *
 * A submitter moves through four prompts: file, name, description and
 * visibility. Each step is validated on its own, and the theme row is written
 * in a single `createTheme` call once the preview has been rendered and stored.
 * Nothing is persisted for a dialog that never completes, apart from artifacts
 * that are deleted again when the draft is dropped.
 *
 * Drafts are kept in process, one per submitter. A new `startUpload` replaces
 * whatever draft the submitter had.
 */

import path from 'path';
import fs from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import type { Config } from '../lib/config';
import { validateThemeFile, type ThemeConfig } from '../lib/schema/theme';
import type { DbTheme, ThemeRepository, Visibility } from './db/types';
import type { Renderer } from './render/renderPreview';
import { discardArtifacts, generateArtifactKey, type ArtifactStore } from './storage';
import { computeContentHash } from './identity';
import { ConflictError, RenderError } from './errors';

// =============================================================================
// Types
// =============================================================================

export type SubmissionStage =
  | 'awaiting_file'
  | 'awaiting_name'
  | 'awaiting_description'
  | 'awaiting_visibility'
  | 'finalizing';

interface StoredThemeFile {
  contentRef: string;
  contentHash: string;
  config: ThemeConfig;
}

type Draft =
  | { stage: 'awaiting_file' }
  | { stage: 'awaiting_name'; file: StoredThemeFile }
  | { stage: 'awaiting_description'; file: StoredThemeFile; name: string }
  | { stage: 'awaiting_visibility'; file: StoredThemeFile; name: string; description: string }
  | { stage: 'finalizing'; file: StoredThemeFile; name: string; description: string; visibility: Visibility };

type FinalizingDraft = Extract<Draft, { stage: 'finalizing' }>;

/** An uploaded file as the transport hands it over, before its bytes are local. */
export interface IncomingThemeFile {
  filename: string;
  /** Size declared by the transport */
  size: number;
  writeTo(destination: string): Promise<void>;
}

type NoDraft = { status: 'no_active_submission' };
type WrongStage = { status: 'wrong_stage'; stage: SubmissionStage };

export type StartUploadOutcome =
  | { status: 'accepted'; remainingSlots: number }
  | { status: 'quota_exceeded'; used: number; slots: number }
  | { status: 'banned' };

export type SubmitFileOutcome =
  | { status: 'accepted'; remainingSlots: number }
  | { status: 'invalid_format'; expectedExtension: string }
  | { status: 'too_large'; maxBytes: number }
  | { status: 'duplicate_content' }
  | { status: 'invalid_structure'; error: string }
  | NoDraft
  | WrongStage;

export type SubmitNameOutcome =
  | { status: 'accepted' }
  | { status: 'invalid_name' }
  | NoDraft
  | WrongStage;

export type SubmitDescriptionOutcome =
  | { status: 'accepted' }
  | NoDraft
  | WrongStage;

export type SubmitVisibilityOutcome =
  | {
      status: 'completed';
      theme: DbTheme;
      publicId: string;
      preview: Buffer;
      /** Set for private themes, which are reachable only through this link */
      shareUrl: string | null;
    }
  | { status: 'invalid_visibility' }
  | { status: 'render_failed'; error: string }
  | { status: 'storage_conflict' }
  | { status: 'quota_exceeded'; used: number; slots: number }
  | NoDraft
  | WrongStage;

export type SubmissionOptions = Pick<
  Config,
  'themeFileExtension' | 'maxFileSizeBytes' | 'workDir' | 'publicUrl'
>;

/** Wrap an in-memory upload (e.g. multer memory storage) as an IncomingThemeFile. */
export function bufferedThemeFile(filename: string, bytes: Uint8Array): IncomingThemeFile {
  return {
    filename,
    size: bytes.byteLength,
    writeTo: destination => fs.writeFile(destination, bytes),
  };
}

export function shareUrlFor(publicUrl: string, publicId: string): string {
  return `${publicUrl}/api/shared/${encodeURIComponent(publicId)}`;
}

function parseVisibility(choice: string): Visibility | null {
  const value = choice.trim().toLowerCase();
  return value === 'public' || value === 'private' ? value : null;
}

// =============================================================================
// Service
// =============================================================================

export class SubmissionService {
  private readonly drafts = new Map<string, Draft>();

  constructor(
    private readonly repo: ThemeRepository,
    private readonly store: ArtifactStore,
    private readonly renderer: Renderer,
    private readonly options: SubmissionOptions
  ) {}

  getStage(ownerId: string): SubmissionStage | null {
    return this.drafts.get(ownerId)?.stage ?? null;
  }

  // ---------------------------------------------------------------------------
  // Draft bookkeeping
  // ---------------------------------------------------------------------------

  private async slotUsage(ownerId: string): Promise<{ used: number; slots: number }> {
    const [user, used] = await Promise.all([
      this.repo.getUser(ownerId),
      this.repo.countThemesOwnedBy(ownerId),
    ]);
    return { used, slots: user?.theme_slots ?? 0 };
  }

  /** Replace the stored draft only if `expected` is still the current one. */
  private advance(ownerId: string, expected: Draft, next: Draft): boolean {
    if (this.drafts.get(ownerId) !== expected) return false;
    this.drafts.set(ownerId, next);
    return true;
  }

  /**
   * Forget a draft the submitter walked away from. A finalizing draft only
   * leaves the map: its submitVisibility call still owns the stored file and
   * either commits it or discards it on the way out.
   */
  private async abandonDraft(ownerId: string, draft: Draft): Promise<void> {
    if (draft.stage === 'finalizing') {
      if (this.drafts.get(ownerId) === draft) this.drafts.delete(ownerId);
      return;
    }
    await this.dropDraft(ownerId, draft);
  }

  private async dropDraft(ownerId: string, draft: Draft, extraRefs: string[] = []): Promise<void> {
    if (this.drafts.get(ownerId) === draft) {
      this.drafts.delete(ownerId);
    }
    const refs = draft.stage === 'awaiting_file' ? extraRefs : [draft.file.contentRef, ...extraRefs];
    await discardArtifacts(this.store, refs);
  }

  // ---------------------------------------------------------------------------
  // Dialog steps
  // ---------------------------------------------------------------------------

  async startUpload(ownerId: string, displayName?: string | null): Promise<StartUploadOutcome> {
    const user = await this.repo.upsertUser(ownerId, displayName);
    if (user.is_banned) {
      return { status: 'banned' };
    }

    const used = await this.repo.countThemesOwnedBy(ownerId);
    if (used >= user.theme_slots) {
      return { status: 'quota_exceeded', used, slots: user.theme_slots };
    }

    const previous = this.drafts.get(ownerId);
    const draft: Draft = { stage: 'awaiting_file' };
    this.drafts.set(ownerId, draft);
    if (previous) {
      await this.abandonDraft(ownerId, previous);
    }

    return { status: 'accepted', remainingSlots: user.theme_slots - used };
  }

  async submitFile(ownerId: string, file: IncomingThemeFile): Promise<SubmitFileOutcome> {
    const draft = this.drafts.get(ownerId);
    if (!draft) return { status: 'no_active_submission' };
    if (draft.stage !== 'awaiting_file') return { status: 'wrong_stage', stage: draft.stage };

    const { themeFileExtension, maxFileSizeBytes, workDir } = this.options;

    if (path.extname(file.filename).toLowerCase() !== themeFileExtension) {
      return { status: 'invalid_format', expectedExtension: themeFileExtension };
    }
    if (file.size > maxFileSizeBytes) {
      return { status: 'too_large', maxBytes: maxFileSizeBytes };
    }

    await fs.mkdir(workDir, { recursive: true });
    const tempPath = path.join(workDir, `upload-${uuidv4()}${themeFileExtension}`);

    let stored: StoredThemeFile;
    try {
      await file.writeTo(tempPath);
      const bytes = await fs.readFile(tempPath);

      // The declared size can lie; trust what actually arrived
      if (bytes.byteLength > maxFileSizeBytes) {
        return { status: 'too_large', maxBytes: maxFileSizeBytes };
      }

      const contentHash = computeContentHash(bytes);
      if (await this.repo.hashExists(contentHash)) {
        return { status: 'duplicate_content' };
      }

      const parsed = validateThemeFile(bytes);
      if (!parsed.success) {
        return { status: 'invalid_structure', error: parsed.error };
      }

      const contentRef = await this.store.put(
        generateArtifactKey('themes', themeFileExtension),
        bytes,
        'application/json'
      );
      stored = { contentRef, contentHash, config: parsed.data };
    } finally {
      await fs.rm(tempPath, { force: true });
    }

    if (!this.advance(ownerId, draft, { stage: 'awaiting_name', file: stored })) {
      // Replaced or cancelled while the file was in flight
      await discardArtifacts(this.store, [stored.contentRef]);
      return { status: 'no_active_submission' };
    }

    const { used, slots } = await this.slotUsage(ownerId);
    return { status: 'accepted', remainingSlots: slots - used };
  }

  submitName(ownerId: string, text: string): SubmitNameOutcome {
    const draft = this.drafts.get(ownerId);
    if (!draft) return { status: 'no_active_submission' };
    if (draft.stage !== 'awaiting_name') return { status: 'wrong_stage', stage: draft.stage };

    if (text.length === 0) {
      return { status: 'invalid_name' };
    }

    this.drafts.set(ownerId, { stage: 'awaiting_description', file: draft.file, name: text });
    return { status: 'accepted' };
  }

  submitDescription(ownerId: string, text: string): SubmitDescriptionOutcome {
    const draft = this.drafts.get(ownerId);
    if (!draft) return { status: 'no_active_submission' };
    if (draft.stage !== 'awaiting_description') return { status: 'wrong_stage', stage: draft.stage };

    this.drafts.set(ownerId, {
      stage: 'awaiting_visibility',
      file: draft.file,
      name: draft.name,
      description: text,
    });
    return { status: 'accepted' };
  }

  /**
   * Last step: render, store the preview and write the theme row.
   * The draft is gone afterwards whatever the outcome, except for an
   * unrecognized visibility choice, which leaves it waiting for another answer.
   */
  async submitVisibility(ownerId: string, choice: string): Promise<SubmitVisibilityOutcome> {
    const current = this.drafts.get(ownerId);
    if (!current) return { status: 'no_active_submission' };
    if (current.stage !== 'awaiting_visibility') return { status: 'wrong_stage', stage: current.stage };

    const visibility = parseVisibility(choice);
    if (!visibility) {
      return { status: 'invalid_visibility' };
    }

    const draft: FinalizingDraft = { ...current, stage: 'finalizing', visibility };
    this.drafts.set(ownerId, draft);

    let previewRef: string | null = null;
    let committed = false;
    try {
      const { used, slots } = await this.slotUsage(ownerId);
      if (used >= slots) {
        return { status: 'quota_exceeded', used, slots };
      }

      let preview: Buffer;
      try {
        preview = await this.renderer.render(draft.file.config);
      } catch (err) {
        if (err instanceof RenderError) {
          console.error(`[submission] preview render failed for ${ownerId}:`, err.cause ?? err);
          return { status: 'render_failed', error: err.message };
        }
        throw err;
      }

      previewRef = await this.store.put(generateArtifactKey('previews', '.jpg'), preview, this.renderer.mimeType);

      let theme: DbTheme;
      try {
        theme = await this.repo.createTheme({
          ownerId,
          name: draft.name,
          description: draft.description,
          visibility,
          contentRef: draft.file.contentRef,
          contentHash: draft.file.contentHash,
          previewRef,
        });
      } catch (err) {
        if (err instanceof ConflictError) {
          console.warn(`[submission] ${err.message} while finalizing for ${ownerId}`);
          return { status: 'storage_conflict' };
        }
        throw err;
      }

      committed = true;
      console.log(`[submission] ${ownerId} published theme ${theme.id} (${visibility})`);

      return {
        status: 'completed',
        theme,
        publicId: theme.public_id,
        preview,
        shareUrl: visibility === 'private' ? shareUrlFor(this.options.publicUrl, theme.public_id) : null,
      };
    } finally {
      if (committed) {
        if (this.drafts.get(ownerId) === draft) this.drafts.delete(ownerId);
      } else {
        await this.dropDraft(ownerId, draft, previewRef ? [previewRef] : []);
      }
    }
  }

  /** Abandon the current draft. Returns false when there was none. */
  async cancel(ownerId: string): Promise<boolean> {
    const draft = this.drafts.get(ownerId);
    if (!draft) return false;
    await this.abandonDraft(ownerId, draft);
    return true;
  }
}
