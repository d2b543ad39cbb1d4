import type { Context } from 'hono';

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

/**
 * Parse a JSON request body with a byte-size guard.
 * Checks Content-Length up front and the decoded body afterwards, since the
 * header can be absent or wrong.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const tooLarge = () => c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);

  const contentLength = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(contentLength) && contentLength > maxBytes) {
    return { ok: false, response: tooLarge() };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  let raw: string;
  try {
    raw = await c.req.text();
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }
  if (Buffer.byteLength(raw, 'utf8') > maxBytes) {
    return { ok: false, response: tooLarge() };
  }

  if (!raw.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON' }, 400) };
  }
}
