/**
 * HTTP transport shared by the catalog clients.
 * Every failure (network, timeout, non-2xx, unparseable body) becomes an
 * AdapterError tagged with the server it came from.
 */

import { AdapterError, errorMessage } from '../shared/errors.js';
import { sanitizeUrlForLogs, type Logger } from '../shared/logger.js';
import type { ServerName } from '../shared/types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  server: ServerName;
  url: string;
  method?: HttpMethod;
  headers: Record<string, string>;
  timeoutMs: number;
  logger: Logger;
}

async function send(req: HttpRequest): Promise<{ res: Response; ms: number }> {
  const method = req.method ?? 'GET';
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), req.timeoutMs);
  const safeUrl = sanitizeUrlForLogs(req.url);
  const startedAt = Date.now();

  try {
    const res = await fetch(req.url, { method, headers: req.headers, signal: controller.signal });
    const ms = Date.now() - startedAt;

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      req.logger.debug(`${req.server} HTTP ${method} ${safeUrl} -> ${res.status} (${ms}ms)`);
      throw new AdapterError(
        req.server,
        `HTTP ${res.status} ${res.statusText} — ${method} ${safeUrl} ${body.slice(0, 200)}`.trim(),
        res.status
      );
    }

    req.logger.debug(`${req.server} HTTP ${method} ${safeUrl} -> ${res.status} (${ms}ms)`);
    return { res, ms };
  } catch (err) {
    if (err instanceof AdapterError) throw err;
    const reason = controller.signal.aborted ? `timed out after ${req.timeoutMs}ms` : errorMessage(err);
    throw new AdapterError(req.server, `Could not reach ${safeUrl}: ${reason}`, undefined, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

export async function requestJson(req: HttpRequest): Promise<unknown> {
  const { res } = await send({ ...req, headers: { Accept: 'application/json', ...req.headers } });
  const text = await res.text();
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new AdapterError(req.server, `Malformed JSON from ${sanitizeUrlForLogs(req.url)}: ${errorMessage(err)}`);
  }
}

export async function requestNoContent(req: HttpRequest): Promise<void> {
  await send(req);
}

// ──────────────────────────────────────────────────────────────────
// Payload readers
// ──────────────────────────────────────────────────────────────────

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asObjectArray(value: unknown): JsonObject[] {
  if (value == null) return [];
  const list = Array.isArray(value) ? value : [value];
  return list.filter(isObject);
}

export function toStringSafe(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

export function toInt(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && value.trim()) {
    const n = Number.parseInt(value.trim(), 10);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

/** Object at `key`, or an AdapterError naming what was expected */
export function requireObject(server: ServerName, value: unknown, what: string): JsonObject {
  if (!isObject(value)) throw new AdapterError(server, `Malformed response: expected ${what}`);
  return value;
}
