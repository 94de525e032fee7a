/**
 * Submission dialog routes.
 *
 * Each step maps one dialog outcome onto a status code and a JSON body in the
 * `{ success, error, code }` shape the rest of the API uses.
 */

import type { Config } from '../../lib/config';
import type { ThemeRepository } from '../db/types';
import type { ThemeCatalog } from '../themes';
import { bufferedThemeFile, type SubmissionService, type SubmissionStage } from '../submissions';
import { resolveCaller } from '../auth/identity';
import { BannedError, QuotaExceededError, ValidationError } from '../errors';
import { sendFailure, type ApiHandler, type ApiResponse } from './http';
import { parseInput, textInputSchema, visibilityChoiceSchema } from './validation';
import { themeResponse } from './themes';

export interface SubmissionRouteDeps {
  repo: ThemeRepository;
  submissions: SubmissionService;
  catalog: ThemeCatalog;
  config: Pick<Config, 'publicUrl'>;
}

type DialogMiss =
  | { status: 'no_active_submission' }
  | { status: 'wrong_stage'; stage: SubmissionStage };

function sendDialogMiss(res: ApiResponse, outcome: DialogMiss): void {
  if (outcome.status === 'no_active_submission') {
    sendFailure(res, 409, 'NO_ACTIVE_SUBMISSION', 'Start an upload first');
    return;
  }
  sendFailure(res, 409, 'WRONG_STAGE', `This step is not expected now (current stage: ${outcome.stage})`, {
    stage: outcome.stage,
  });
}

function sendQuotaExceeded(res: ApiResponse, used: number, slots: number): void {
  const err = new QuotaExceededError(used, slots);
  sendFailure(res, err.status, err.code, err.message, { used, slots });
}

export function createSubmissionHandlers({ repo, submissions, catalog, config }: SubmissionRouteDeps) {
  /**
   * GET /api/me
   * Caller's account, slot usage and open draft.
   */
  const me: ApiHandler = async (req, res) => {
    const user = await resolveCaller(req, repo);
    const account = await catalog.getAccount(user.id);
    res.json({
      success: true,
      user: {
        id: user.id,
        displayName: user.display_name,
        themeSlots: user.theme_slots,
        usedSlots: account.used,
        remainingSlots: account.remainingSlots,
        createdAt: user.created_at,
      },
      stage: submissions.getStage(user.id),
    });
  };

  /**
   * POST /api/submissions
   * Starts (or restarts) the dialog.
   */
  const start: ApiHandler = async (req, res) => {
    const user = await resolveCaller(req, repo);
    const outcome = await submissions.startUpload(user.id, user.display_name);

    switch (outcome.status) {
      case 'accepted':
        res.status(201).json({ success: true, stage: 'awaiting_file', remainingSlots: outcome.remainingSlots });
        return;
      case 'quota_exceeded':
        sendQuotaExceeded(res, outcome.used, outcome.slots);
        return;
      case 'banned':
        throw new BannedError();
    }
  };

  /**
   * POST /api/submissions/file
   * Multipart body with a single `file` field.
   */
  const file: ApiHandler = async (req, res) => {
    const user = await resolveCaller(req, repo);
    if (!req.file) {
      throw new ValidationError('No file provided. Send it as multipart field "file".');
    }

    const outcome = await submissions.submitFile(user.id, bufferedThemeFile(req.file.originalname, req.file.buffer));

    switch (outcome.status) {
      case 'accepted':
        res.json({ success: true, stage: 'awaiting_name', remainingSlots: outcome.remainingSlots });
        return;
      case 'invalid_format':
        sendFailure(res, 400, 'INVALID_FORMAT', `Theme files must use the ${outcome.expectedExtension} extension`, {
          expectedExtension: outcome.expectedExtension,
        });
        return;
      case 'too_large':
        sendFailure(res, 413, 'FILE_TOO_LARGE', `File too large. Maximum size is ${outcome.maxBytes} bytes.`, {
          maxBytes: outcome.maxBytes,
        });
        return;
      case 'duplicate_content':
        sendFailure(res, 409, 'DUPLICATE_CONTENT', 'This theme has already been uploaded');
        return;
      case 'invalid_structure':
        sendFailure(res, 400, 'INVALID_STRUCTURE', outcome.error);
        return;
      default:
        sendDialogMiss(res, outcome);
    }
  };

  /**
   * POST /api/submissions/name
   * Body: { text: string }
   */
  const name: ApiHandler = async (req, res) => {
    const user = await resolveCaller(req, repo);
    const { text } = parseInput(textInputSchema, req.body);
    const outcome = submissions.submitName(user.id, text);

    switch (outcome.status) {
      case 'accepted':
        res.json({ success: true, stage: 'awaiting_description' });
        return;
      case 'invalid_name':
        sendFailure(res, 400, 'INVALID_NAME', 'Name must not be empty');
        return;
      default:
        sendDialogMiss(res, outcome);
    }
  };

  /**
   * POST /api/submissions/description
   * Body: { text: string } (may be empty)
   */
  const description: ApiHandler = async (req, res) => {
    const user = await resolveCaller(req, repo);
    const { text } = parseInput(textInputSchema, req.body);
    const outcome = submissions.submitDescription(user.id, text);

    if (outcome.status === 'accepted') {
      res.json({ success: true, stage: 'awaiting_visibility' });
      return;
    }
    sendDialogMiss(res, outcome);
  };

  /**
   * POST /api/submissions/visibility
   * Body: { visibility: 'public' | 'private' }
   * Renders the preview and publishes the theme.
   */
  const visibility: ApiHandler = async (req, res) => {
    const user = await resolveCaller(req, repo);
    const { visibility: choice } = parseInput(visibilityChoiceSchema, req.body);
    const outcome = await submissions.submitVisibility(user.id, choice);

    switch (outcome.status) {
      case 'completed':
        res.status(201).json({
          success: true,
          theme: themeResponse(outcome.theme, config.publicUrl),
          // Only private themes need the link to be handed out
          shareUrl: outcome.shareUrl,
        });
        return;
      case 'invalid_visibility':
        sendFailure(res, 400, 'INVALID_VISIBILITY', 'visibility must be "public" or "private"');
        return;
      case 'render_failed':
        sendFailure(res, 500, 'RENDER_FAILED', 'Could not render a preview for this theme. Please start over.');
        return;
      case 'storage_conflict':
        sendFailure(res, 409, 'STORAGE_CONFLICT', 'This theme was just uploaded by someone else. Please start over.');
        return;
      case 'quota_exceeded':
        sendQuotaExceeded(res, outcome.used, outcome.slots);
        return;
      default:
        sendDialogMiss(res, outcome);
    }
  };

  /**
   * DELETE /api/submissions
   */
  const cancel: ApiHandler = async (req, res) => {
    const user = await resolveCaller(req, repo);
    res.json({ success: true, cancelled: await submissions.cancel(user.id) });
  };

  return { me, start, file, name, description, visibility, cancel };
}
