import { ProviderCallError } from '../gateway/providerErrors';

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpRequestOptions {
  signal?: AbortSignal;
  query?: QueryParams;
  headers?: Record<string, string>;
  method?: 'GET' | 'POST';
  body?: unknown;
}

const DEFAULT_HEADERS = {
  'User-Agent': 'compound-prioritizer/0.1',
};

export function buildUrl(base: string, path: string, query?: QueryParams): string {
  const url = new URL(path ? `${base.replace(/\/$/, '')}/${path.replace(/^\//, '')}` : base);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

async function send(url: string, options: HttpRequestOptions, accept: string): Promise<Response> {
  const headers: Record<string, string> = { ...DEFAULT_HEADERS, Accept: accept, ...options.headers };
  let body: string | undefined;
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(options.body);
  }
  const target = options.query ? buildUrl(url, '', options.query) : url;
  return fetch(target, {
    method: options.method ?? (body === undefined ? 'GET' : 'POST'),
    headers,
    body,
    signal: options.signal,
  });
}

async function failure(response: Response, url: string): Promise<ProviderCallError> {
  const text = await response.text().catch(() => '');
  return new ProviderCallError(
    `${new URL(url).host} responded ${response.status} ${response.statusText}${text ? ` - ${text.slice(0, 200)}` : ''}`,
    { status: response.status },
  );
}

async function readJson(response: Response, url: string): Promise<unknown> {
  try {
    return await response.json();
  } catch (error) {
    throw new ProviderCallError(`${new URL(url).host} returned malformed JSON`, { transient: false, cause: error });
  }
}

/** GET/POST a JSON endpoint; non-2xx responses become ProviderCallError. */
export async function fetchJson(url: string, options: HttpRequestOptions = {}): Promise<unknown> {
  const response = await send(url, options, 'application/json');
  if (!response.ok) throw await failure(response, url);
  return readJson(response, url);
}

/** As fetchJson, but a 404 resolves to null. */
export async function fetchJsonOrNull(url: string, options: HttpRequestOptions = {}): Promise<unknown> {
  const response = await send(url, options, 'application/json');
  if (response.status === 404) return null;
  if (!response.ok) throw await failure(response, url);
  return readJson(response, url);
}

export async function fetchText(url: string, options: HttpRequestOptions = {}): Promise<string> {
  const response = await send(url, options, 'text/plain');
  if (!response.ok) throw await failure(response, url);
  return response.text();
}
