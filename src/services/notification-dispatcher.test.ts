import { beforeEach, describe, expect, it, vi } from 'vitest';
import fetch, { Response } from 'node-fetch';
import { NoopNotifier, OneSignalNotifier, formatNotificationMessage } from './notification-dispatcher';
import { sampleJob } from '../test-utils/in-memory-store';

vi.mock('node-fetch', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node-fetch')>()),
  default: vi.fn(),
}));

const mockedFetch = vi.mocked(fetch);

beforeEach(() => {
  mockedFetch.mockReset();
});

describe('formatNotificationMessage', () => {
  it('names the company and the role', () => {
    expect(formatNotificationMessage(sampleJob())).toBe(
      'Acme Corp has openings for Software Engineer. Click now to apply!'
    );
  });

  it('substitutes placeholders for empty fields', () => {
    expect(formatNotificationMessage(sampleJob({ company: '', jobTitle: '' }))).toBe(
      'Unknown Company has openings for Job Opening. Click now to apply!'
    );
  });
});

describe('OneSignalNotifier', () => {
  it('posts to every subscriber and links the apply page', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

    const sent = await new OneSignalNotifier('test-app', 'test-secret').notify(sampleJob());

    expect(sent).toBe(true);
    const [url, init] = mockedFetch.mock.calls[0];
    expect(url).toBe('https://onesignal.com/api/v1/notifications');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json; charset=utf-8',
      Authorization: 'Basic test-secret',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      app_id: 'test-app',
      included_segments: ['All'],
      headings: { en: 'Job Opening Notification' },
      contents: { en: 'Acme Corp has openings for Software Engineer. Click now to apply!' },
      url: 'https://apply.example.com/acme',
    });
  });

  it('links the source page when there is no apply link', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 202 }));

    await new OneSignalNotifier('test-app', 'test-secret').notify(sampleJob({ applyLink: 'N/A' }));

    const [, init] = mockedFetch.mock.calls[0];
    expect(JSON.parse(String(init?.body)).url).toBe('https://fresheropenings.com/acme-hiring/');
  });

  it('resolves false on an error status or a network failure', async () => {
    mockedFetch
      .mockResolvedValueOnce(new Response('{"errors":["bad key"]}', { status: 400 }))
      .mockRejectedValueOnce(new Error('ETIMEDOUT'));
    const notifier = new OneSignalNotifier('test-app', 'test-secret');

    expect(await notifier.notify(sampleJob())).toBe(false);
    expect(await notifier.notify(sampleJob())).toBe(false);
  });
});

describe('NoopNotifier', () => {
  it('reports success without sending anything', async () => {
    expect(await new NoopNotifier().notify(sampleJob())).toBe(true);
    expect(mockedFetch).not.toHaveBeenCalled();
  });
});
