import fetch from 'node-fetch';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36';

export interface PageResponse {
  status: number;
  ok: boolean;
  body: string;
}

export interface PageFetcher {
  get(url: string, headers?: Record<string, string>): Promise<PageResponse>;
}

/**
 * node-fetch backed page fetcher with browser-like headers
 */
export function createPageFetcher(timeoutMs: number = 10000): PageFetcher {
  return {
    async get(url, headers = {}) {
      const response = await fetch(url, {
        headers: {
          'User-Agent': BROWSER_USER_AGENT,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
          Connection: 'keep-alive',
          ...headers,
        },
        timeout: timeoutMs,
      });

      return {
        status: response.status,
        ok: response.ok,
        body: await response.text(),
      };
    },
  };
}
