import { describe, it, expect, vi } from 'vitest';
import { createIdentityContext } from '@docmesh/aggregator';
import { NotionAdapter, blockText, pageTitle, type NotionPage } from '../notion.js';
import { RetryPolicy } from '../retry.js';
import { createStubClient, fixedClock, jsonBody, type StubHandler } from './http-stub.js';

const identity = createIdentityContext({
  userId: 'user-1',
  email: 'user-1@example.com',
  accessToken: 'test-token',
  scopes: ['notion:read'],
});

const silent = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
const signal = new AbortController().signal;

function page(id: string, title: string, overrides: Partial<NotionPage> = {}): NotionPage {
  return {
    object: 'page',
    id,
    url: `https://notion.example.com/${id}`,
    created_time: '2024-01-01T00:00:00.000Z',
    last_edited_time: '2024-05-09T08:00:00.000Z',
    created_by: { id: 'u-1', name: 'Avery' },
    properties: { Name: { type: 'title', title: [{ plain_text: title }] } },
    ...overrides,
  };
}

function createAdapter(handler: StubHandler, apiVersion?: string) {
  const { client, requests } = createStubClient(handler);
  const adapter = new NotionAdapter(identity, {
    client,
    apiVersion,
    logger: silent,
    clock: fixedClock('2024-05-10T12:00:00.000Z'),
    retry: new RetryPolicy({ maxRetries: 1 }, { sleep: async () => {}, logger: silent }),
  });
  return { adapter, requests };
}

describe('pageTitle', () => {
  it('should join the title property text', () => {
    expect(
      pageTitle({ properties: { Name: { type: 'title', title: [{ plain_text: 'Team ' }, { plain_text: 'Wiki' }] } } })
    ).toBe('Team Wiki');
  });

  it('should fall back to Untitled', () => {
    expect(pageTitle({ properties: { Tags: { type: 'multi_select' } } })).toBe('Untitled');
  });
});

describe('blockText', () => {
  it('should read rich text under the block type key', () => {
    expect(blockText({ type: 'paragraph', paragraph: { rich_text: [{ plain_text: 'Hello' }] } })).toBe('Hello');
  });

  it('should return empty text for blocks without rich text', () => {
    expect(blockText({ type: 'image', image: { file: { url: 'https://img.example.com/a.png' } } })).toBe('');
    expect(blockText({ type: 'divider' })).toBe('');
  });
});

describe('NotionAdapter', () => {
  it('should search pages with the version header', async () => {
    const { adapter, requests } = createAdapter(() => ({
      status: 200,
      data: { results: [page('p-1', 'Budget Notes')] },
    }));

    const result = await adapter.search('budget', 5, signal);

    expect(requests[0].method).toBe('post');
    expect(requests[0].url).toBe('/search');
    expect(requests[0].headers['Notion-Version']).toBe('2022-06-28');
    expect(requests[0].headers['Authorization']).toBe('Bearer test-token');
    expect(jsonBody(requests[0])).toEqual({
      query: 'budget',
      filter: { property: 'object', value: 'page' },
      page_size: 5,
    });
    expect(result).toEqual({
      ok: true,
      value: [
        {
          id: 'notion:p-1',
          title: 'Budget Notes',
          snippet: 'Page: Budget Notes',
          url: 'https://notion.example.com/p-1',
          source: 'notion',
          lastModified: '2024-05-09T08:00:00.000Z',
          author: 'Avery',
          accessLevel: 'viewer',
        },
      ],
    });
  });

  it('should use a configured API version', async () => {
    const { adapter, requests } = createAdapter(() => ({ status: 200, data: { results: [] } }), '2025-01-01');

    await adapter.search('budget', 5, signal);

    expect(requests[0].headers['Notion-Version']).toBe('2025-01-01');
  });

  it('should build document content from block text', async () => {
    const { adapter } = createAdapter((config) => {
      if (config.url === '/pages/p-1') return { status: 200, data: page('p-1', 'Onboarding') };
      if (config.url === '/blocks/p-1/children') {
        return {
          status: 200,
          data: {
            results: [
              { type: 'heading_1', heading_1: { rich_text: [{ plain_text: 'Intro' }] } },
              { type: 'image', image: {} },
              { type: 'paragraph', paragraph: { rich_text: [{ plain_text: 'Second ' }, { plain_text: 'line' }] } },
            ],
          },
        };
      }
      return { status: 404 };
    });

    const result = await adapter.getDocument('p-1', signal);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toMatchObject({
      id: 'notion:p-1',
      title: 'Onboarding',
      content: 'Intro\nSecond line',
      source: 'notion',
    });
  });

  it('should report a forbidden page as access_denied', async () => {
    const { adapter } = createAdapter(() => ({ status: 403 }));

    const result = await adapter.getDocument('p-1', signal);

    expect(result).toEqual({ ok: false, error: { type: 'access_denied', message: 'Access denied: Notion page p-1' } });
  });

  it('should return recently edited pages within the window', async () => {
    const { adapter, requests } = createAdapter(() => ({
      status: 200,
      data: {
        results: [
          page('fresh', 'New Page', {
            created_time: '2024-05-09T08:00:00.000Z',
            last_edited_time: '2024-05-09T08:00:20.000Z',
          }),
          page('edited', 'Roadmap', { last_edited_by: { id: 'u-2', name: 'Sam' } }),
          page('stale', 'Archive', { last_edited_time: '2024-04-01T00:00:00.000Z' }),
        ],
      },
    }));

    const result = await adapter.getRecentUpdates(7, signal);

    expect(jsonBody(requests[0])).toMatchObject({
      sort: { direction: 'descending', timestamp: 'last_edited_time' },
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map((update) => [update.id, update.updateType, update.snippet, update.author])).toEqual([
      ['notion:fresh', 'created', 'Created page: New Page', 'Avery'],
      ['notion:edited', 'modified', 'Edited page: Roadmap', 'Sam'],
    ]);
  });
});
