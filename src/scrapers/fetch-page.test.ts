import { beforeEach, describe, expect, it, vi } from 'vitest';
import fetch, { Response } from 'node-fetch';
import { createPageFetcher } from './fetch-page';

vi.mock('node-fetch', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node-fetch')>()),
  default: vi.fn(),
}));

const mockedFetch = vi.mocked(fetch);

describe('createPageFetcher', () => {
  beforeEach(() => {
    mockedFetch.mockReset();
  });

  it('returns the body of the first 200 response', async () => {
    mockedFetch
      .mockResolvedValueOnce(new Response('blocked', { status: 403 }))
      .mockResolvedValueOnce(new Response('<html>ok</html>', { status: 200 }));

    const html = await createPageFetcher(1000)('https://fresheropenings.com/a/');

    expect(html).toBe('<html>ok</html>');
    expect(mockedFetch).toHaveBeenCalledTimes(2);
  });

  it('returns null when every header profile fails', async () => {
    mockedFetch
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(new Response('', { status: 503 }));

    expect(await createPageFetcher(1000)('https://fresheropenings.com/a/')).toBeNull();
  });
});
