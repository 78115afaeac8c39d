import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { webSearchTool } from '../web-search-tool.js';
import { env } from '../../../env.js';

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const GOOGLE_ITEMS = {
  items: [
    { title: 'Rates hold steady', link: 'https://news.test/rates', snippet: 'The central bank kept rates.' },
    { title: '', link: 'https://news.test/untitled', snippet: 'No title here' },
    { title: 'Markets rally', link: 'https://news.test/rally', snippet: ' Stocks rose. ' },
  ],
};

describe('webSearchTool', () => {
  const saved = {
    provider: env.WEB_SEARCH_PROVIDER,
    googleKey: env.GOOGLE_API_KEY,
    cseId: env.GOOGLE_CSE_ID,
    braveKey: env.BRAVE_SEARCH_API_KEY,
  };
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    env.WEB_SEARCH_PROVIDER = 'google';
    env.GOOGLE_API_KEY = 'test-google-key';
    env.GOOGLE_CSE_ID = 'test-cse';
    env.BRAVE_SEARCH_API_KEY = 'test-brave-key';
    fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(GOOGLE_ITEMS));
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    env.WEB_SEARCH_PROVIDER = saved.provider;
    env.GOOGLE_API_KEY = saved.googleKey;
    env.GOOGLE_CSE_ID = saved.cseId;
    env.BRAVE_SEARCH_API_KEY = saved.braveKey;
    vi.unstubAllGlobals();
  });

  it('returns ranked Google results and skips untitled hits', async () => {
    const payload = await webSearchTool.invoke({ query: ' interest rates ' });

    expect(payload).toEqual({
      query: 'interest rates',
      source: 'google_custom_search',
      results: [
        { rank: 1, title: 'Rates hold steady', url: 'https://news.test/rates', snippet: 'The central bank kept rates.' },
        { rank: 2, title: 'Markets rally', url: 'https://news.test/rally', snippet: 'Stocks rose.' },
      ],
    });

    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.searchParams.get('key')).toBe('test-google-key');
    expect(url.searchParams.get('cx')).toBe('test-cse');
    expect(url.searchParams.get('q')).toBe('interest rates');
    expect(url.searchParams.get('num')).toBe('5');
    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it('clamps the requested result count', async () => {
    await webSearchTool.invoke({ query: 'rates', num_results: 50 });

    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.searchParams.get('num')).toBe('10');
  });

  it('uses Brave when configured', async () => {
    env.WEB_SEARCH_PROVIDER = 'brave';
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ web: { results: [{ title: 'Brave hit', url: 'https://b.test', description: 'desc' }] } }),
    );

    const payload = await webSearchTool.invoke({ query: 'rates', num_results: '2' });

    expect(payload).toEqual({
      query: 'rates',
      source: 'brave_search',
      results: [{ rank: 1, title: 'Brave hit', url: 'https://b.test', snippet: 'desc' }],
    });
    const [input, init] = fetchMock.mock.calls[0] ?? [];
    const url = new URL(String(input));
    expect(url.origin + url.pathname).toBe('https://api.search.brave.com/res/v1/web/search');
    expect(url.searchParams.get('count')).toBe('2');
    expect(new Headers(init?.headers).get('X-Subscription-Token')).toBe('test-brave-key');
  });

  it('returns an empty result list when nothing matches', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}));

    const payload = await webSearchTool.invoke({ query: 'zzzz' });

    expect(payload.results).toEqual([]);
  });

  it('reports an upstream error status', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'boom' }, 500));

    await expect(webSearchTool.invoke({ query: 'rates' })).rejects.toThrow('Google Custom Search error (500)');
  });

  it('rejects a blank query', async () => {
    await expect(webSearchTool.invoke({ query: '   ' })).rejects.toThrow(
      'Invalid arguments for web_search: query: must not be empty',
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails when Google credentials are missing', async () => {
    env.GOOGLE_CSE_ID = '';

    await expect(webSearchTool.invoke({ query: 'rates' })).rejects.toThrow(
      'Google Custom Search is not configured (GOOGLE_API_KEY / GOOGLE_CSE_ID)',
    );
  });
});
