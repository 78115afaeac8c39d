import { z } from 'zod';
import { env } from '../env.js';

export interface WebSearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchResult {
  query: string;
  hits: WebSearchHit[];
  source: 'google_custom_search' | 'brave_search';
}

const REQUEST_TIMEOUT_MS = 10000;

const GooglePayloadSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .optional(),
});

const BravePayloadSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
          }),
        )
        .optional(),
    })
    .optional(),
});

function normalizeText(value: unknown): string {
  return String(value ?? '').trim();
}

export function clampResultCount(count: number): number {
  if (!Number.isFinite(count)) return 5;
  return Math.max(1, Math.min(Math.trunc(count), 10));
}

async function getJson(url: URL, headers: Record<string, string>, label: string): Promise<unknown> {
  const response = await fetch(url.toString(), {
    method: 'GET',
    headers: { Accept: 'application/json', ...headers },
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });

  if (!response.ok) {
    throw new Error(`${label} error (${response.status})`);
  }

  return response.json();
}

async function searchGoogle(query: string, count: number): Promise<WebSearchHit[]> {
  if (!env.GOOGLE_API_KEY || !env.GOOGLE_CSE_ID) {
    throw new Error('Google Custom Search is not configured (GOOGLE_API_KEY / GOOGLE_CSE_ID)');
  }

  const endpoint = new URL('https://www.googleapis.com/customsearch/v1');
  endpoint.searchParams.set('key', env.GOOGLE_API_KEY);
  endpoint.searchParams.set('cx', env.GOOGLE_CSE_ID);
  endpoint.searchParams.set('q', query);
  endpoint.searchParams.set('num', String(count));

  const parsed = GooglePayloadSchema.safeParse(await getJson(endpoint, {}, 'Google Custom Search'));
  if (!parsed.success) {
    throw new Error('Google Custom Search returned an unexpected payload');
  }

  return (parsed.data.items || []).map(item => ({
    title: normalizeText(item.title),
    url: normalizeText(item.link),
    snippet: normalizeText(item.snippet),
  }));
}

async function searchBrave(query: string, count: number): Promise<WebSearchHit[]> {
  if (!env.BRAVE_SEARCH_API_KEY) {
    throw new Error('Brave Search is not configured (BRAVE_SEARCH_API_KEY)');
  }

  const endpoint = new URL('https://api.search.brave.com/res/v1/web/search');
  endpoint.searchParams.set('q', query);
  endpoint.searchParams.set('count', String(count));

  const payload = await getJson(endpoint, { 'X-Subscription-Token': env.BRAVE_SEARCH_API_KEY }, 'Brave Search');
  const parsed = BravePayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error('Brave Search returned an unexpected payload');
  }

  return (parsed.data.web?.results || []).map(item => ({
    title: normalizeText(item.title),
    url: normalizeText(item.url),
    snippet: normalizeText(item.description),
  }));
}

export async function searchWeb(query: string, count = 5): Promise<WebSearchResult> {
  const q = normalizeText(query);
  if (!q) {
    throw new Error('Search query is empty');
  }

  const limit = clampResultCount(count);
  const provider = env.WEB_SEARCH_PROVIDER;

  const hits = provider === 'brave'
    ? await searchBrave(q, limit)
    : await searchGoogle(q, limit);

  return {
    query: q,
    hits: hits.filter(hit => hit.title && hit.url).slice(0, limit),
    source: provider === 'brave' ? 'brave_search' : 'google_custom_search',
  };
}
