/**
 * Request/response seam between Express and the route handlers.
 *
 * Handlers only see the slice of Express they use, so they can be driven by
 * plain objects in tests.
 */

import type { RequestHandler } from 'express';
import { isAppError, type AppError } from '../errors';
import type { ThemeArtifact } from '../themes';

export interface UploadedFile {
  originalname: string;
  size: number;
  buffer: Buffer;
}

export interface ApiRequest {
  params: Record<string, string>;
  query: Record<string, unknown>;
  body: unknown;
  headers: Record<string, string | string[] | undefined>;
  file?: UploadedFile;
}

export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
  setHeader(name: string, value: string): unknown;
  send(body: Buffer): unknown;
}

export type ApiHandler = (req: ApiRequest, res: ApiResponse) => Promise<void>;

export function sendError(res: ApiResponse, err: AppError): void {
  res.status(err.status).json({ success: false, error: err.message, code: err.code });
}

/** Answer a failure that isn't an exception: a dialog outcome the caller can act on. */
export function sendFailure(
  res: ApiResponse,
  status: number,
  code: string,
  error: string,
  extra: Record<string, unknown> = {}
): void {
  res.status(status).json({ success: false, error, code, ...extra });
}

export function sendArtifact(res: ApiResponse, artifact: ThemeArtifact, disposition: 'inline' | 'attachment'): void {
  res.setHeader('Content-Type', artifact.contentType);
  res.setHeader('Content-Disposition', `${disposition}; filename="${artifact.filename}"`);
  res.setHeader('Cache-Control', 'private, max-age=300');
  res.status(200).send(artifact.bytes);
}

/**
 * Run a handler, answering AppErrors with their status and code.
 * Anything else is rethrown for the Express error handler.
 */
export async function invoke(handler: ApiHandler, req: ApiRequest, res: ApiResponse): Promise<void> {
  try {
    await handler(req, res);
  } catch (err) {
    if (!isAppError(err)) throw err;
    sendError(res, err);
  }
}

export function route(handler: ApiHandler): RequestHandler {
  return (req, res, next) => {
    invoke(handler, req, res).catch(next);
  };
}

/** First value of a header, trimmed; null when absent or blank. */
export function headerValue(req: Pick<ApiRequest, 'headers'>, name: string): string | null {
  const raw = req.headers[name.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value?.trim() || null;
}
