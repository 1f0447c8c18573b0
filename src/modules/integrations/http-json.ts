import type { z } from 'zod';

/** Non-2xx response from a collaborator. */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly body: string,
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
  }
}

export interface JsonRequest {
  method?: 'GET' | 'POST' | 'PUT';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

/**
 * fetch + status check + schema validation. Network failures and timeouts
 * surface as the errors fetch raises (TypeError / TimeoutError).
 */
export async function requestJson<T extends z.ZodTypeAny>(
  url: string,
  schema: T,
  init: JsonRequest,
): Promise<z.infer<T>> {
  const text = await requestText(url, init);
  return schema.parse(text === '' ? null : JSON.parse(text));
}

export async function requestText(url: string, init: JsonRequest): Promise<string> {
  const headers: Record<string, string> = { Accept: 'application/json', ...init.headers };
  let body: string | undefined;
  if (init.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(init.body);
  }

  const res = await fetch(url, {
    method: init.method ?? 'GET',
    headers,
    body,
    signal: AbortSignal.timeout(init.timeoutMs),
  });
  const text = await res.text();
  if (!res.ok) {
    throw new HttpStatusError(res.status, url, text.slice(0, 500));
  }
  return text;
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
