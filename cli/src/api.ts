/**
 * API client for the admin server
 *
 * Reads LOTREC_API_URL and LOTREC_API_TOKEN from the environment.
 */

import type { z } from 'zod';

const DEFAULT_BASE_URL = 'http://127.0.0.1:3001';

export function getBaseUrl(): string {
  return process.env.LOTREC_API_URL || DEFAULT_BASE_URL;
}

interface ApiResponse<T> {
  ok: boolean;
  status: number;
  data: T | null;
  error: string | null;
}

function errorMessage(body: unknown, status: number): string {
  if (typeof body === 'object' && body !== null && 'error' in body) {
    const { error } = body;
    if (typeof error === 'string') return error;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }
  return `HTTP ${status}`;
}

export async function api<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
  options: { method?: string; body?: unknown; token?: string } = {}
): Promise<ApiResponse<z.output<S>>> {
  const token = options.token || process.env.LOTREC_API_TOKEN;
  if (!token) {
    console.error('No API token. Set LOTREC_API_TOKEN to the server ADMIN_API_TOKEN.');
    process.exit(1);
  }

  const baseUrl = getBaseUrl();
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'Authorization': `Bearer ${token}`,
  };

  let res: Response;
  try {
    res = await fetch(`${baseUrl}${path}`, {
      method: options.method || 'GET',
      headers,
      ...(options.body ? { body: JSON.stringify(options.body) } : {}),
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`Connection failed: ${msg}`);
    console.error(`Is the server running at ${baseUrl}?`);
    process.exit(1);
  }

  const contentType = res.headers.get('content-type') || '';
  if (!contentType.includes('application/json')) {
    return { ok: false, status: res.status, data: null, error: `Non-JSON response (${res.status}): ${contentType}` };
  }

  const body: unknown = await res.json();
  if (!res.ok) {
    return { ok: false, status: res.status, data: null, error: errorMessage(body, res.status) };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, status: res.status, data: null, error: 'Unexpected response shape from server' };
  }
  return { ok: true, status: res.status, data: parsed.data, error: null };
}
