import { describe, it, expect, vi } from 'vitest';
import { createTestApp } from './helpers.js';

function post(body: string): RequestInit {
  return { method: 'POST', headers: { 'Content-Type': 'application/json' }, body };
}

describe('GET /api/search', () => {
  it('should return snake_case results from every permitted source', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/search?q=budget');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      query: 'budget',
      results: [
        {
          id: 'gdrive:1q-budget-2025',
          title: 'FY25 Budget Planning',
          snippet: 'Quarterly budget allocations and revised spending projections for the platform team.',
          url: 'https://docs.example.com/document/d/1q-budget-2025/edit',
          source: 'gdrive',
          last_modified: '2024-05-10T10:00:00.000Z',
          author: 'Finance Team',
          access_level: 'editor',
          metadata: {},
        },
        {
          id: 'notion:a1b2c3d4-0000-4000-8000-000000000002',
          title: 'Budget Review Meeting Notes',
          snippet:
            'Budget Review Meeting Notes. The team agreed to move the analytics budget into Q3. Action item: finance to circulate the revised forecast by Friday.',
          url: 'https://notion.example.com/Budget-Review-Notes-a1b2c3d4',
          source: 'notion',
          last_modified: '2024-05-10T07:00:00.000Z',
          author: 'Program Office',
          access_level: 'editor',
          metadata: {},
        },
      ],
      total_count: 2,
      failed_sources: [],
      skipped_sources: [],
      cached: false,
    });
  });

  it('should serve a repeated query from cache', async () => {
    const { app } = createTestApp();

    await app.request('/api/search?q=budget');
    const res = await app.request('/api/search?q=budget');

    expect(await res.json()).toMatchObject({ cached: true, total_count: 2 });
  });

  it('should restrict results to the requested sources', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/search?q=budget&sources=notion');

    expect(await res.json()).toMatchObject({
      results: [{ id: 'notion:a1b2c3d4-0000-4000-8000-000000000002' }],
    });
  });

  it('should clamp max_results into range', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/search?q=budget&max_results=0');

    expect(await res.json()).toMatchObject({ results: [{ id: 'gdrive:1q-budget-2025' }], total_count: 1 });
  });

  it('should reject a non-numeric max_results', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/search?q=budget&max_results=many');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { type: 'malformed_input', message: 'max_results must be an integer', field: 'max_results' },
    });
  });

  it('should reject a missing query', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/search');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { type: 'malformed_input', message: 'Query cannot be empty', field: 'query' },
    });
  });

  it('should reject an unknown source', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/search?q=budget&sources=gdrive,dropbox');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { type: 'malformed_input', message: 'Unknown source "dropbox"', field: 'sources' },
    });
  });
});

describe('GET /api/documents/:id', () => {
  it('should return document content', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/documents/slack:C0123-1700000000.000100');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      id: 'slack:C0123-1700000000.000100',
      title: '#incidents: search latency spike',
      content: 'Search latency spiked after the index rebuild. Rolled back at 14:05. Postmortem scheduled for Thursday.',
      source: 'slack',
      url: 'https://chat.example.com/archives/C0123/p1700000000000100',
      last_modified: '2024-05-10T04:00:00.000Z',
      author: 'On-call Bot',
      metadata: {},
    });
  });

  it('should map restricted documents to 403', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/documents/confluence:PAGE-4411');

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: { type: 'access_denied', message: 'Access denied: confluence document PAGE-4411' },
    });
  });

  it('should map unknown documents to 404', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/documents/gdrive:missing');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { type: 'not_found', message: 'Not found: gdrive document missing' } });
  });

  it('should reject an id without a source prefix', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/documents/malformed');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        type: 'malformed_input',
        message: 'Document id "malformed" must have the form <source>:<id>',
        field: 'id',
      },
    });
  });
});

describe('GET /api/updates', () => {
  it('should list updates newest first with the default window', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/updates');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      days: 7,
      updates: [
        { id: 'gdrive:1q-budget-2025', update_type: 'modified' },
        { id: 'notion:a1b2c3d4-0000-4000-8000-000000000002', update_type: 'created' },
        { id: 'slack:C0123-1700000000.000100', update_type: 'created' },
        { id: 'gdrive:2w-review-template', update_type: 'created' },
        { id: 'notion:a1b2c3d4-0000-4000-8000-000000000001', update_type: 'modified' },
        { id: 'gdrive:3e-search-roadmap', update_type: 'modified' },
      ],
      total_count: 6,
      cached: false,
    });
  });

  it('should clamp days and max_results', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/updates?days=90&max_results=2');

    expect(await res.json()).toMatchObject({
      days: 30,
      updates: [{ id: 'gdrive:1q-budget-2025' }, { id: 'notion:a1b2c3d4-0000-4000-8000-000000000002' }],
      total_count: 2,
    });
  });

  it('should reject a non-numeric days value', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/updates?days=week');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { type: 'malformed_input', message: 'days must be an integer', field: 'days' },
    });
  });
});

describe('POST /api/summarize', () => {
  it('should summarize the documents that could be fetched', async () => {
    const { app } = createTestApp();

    const res = await app.request(
      '/api/summarize',
      post(JSON.stringify({ document_ids: ['gdrive:1q-budget-2025', 'gdrive:nope'], max_length: 20 }))
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      summary: 'FY25 Budget Planning',
      key_points: ['FY25 Budget Planning.'],
      source_documents: [{ id: 'gdrive:1q-budget-2025', title: 'FY25 Budget Planning', source: 'gdrive' }],
      failed_documents: [{ id: 'gdrive:nope', error_type: 'not_found', message: 'Not found: gdrive document nope' }],
      cached: false,
    });
  });

  it('should reject a body that is not JSON', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/summarize', post('not json'));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { type: 'malformed_input', message: 'Request body must be valid JSON', field: 'body' },
    });
  });

  it('should reject document_ids that are not strings', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/summarize', post(JSON.stringify({ document_ids: [1, 2] })));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { type: 'malformed_input', message: 'document_ids must be an array of strings', field: 'document_ids' },
    });
  });

  it('should reject an empty id list', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/summarize', post(JSON.stringify({ document_ids: [] })));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { type: 'malformed_input', message: 'At least one document id is required', field: 'document_ids' },
    });
  });
});

describe('gateway fallbacks', () => {
  it('should answer unknown routes with JSON 404', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/nowhere');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { type: 'not_found', message: 'Route not found: GET /api/nowhere' } });
  });

  it('should turn uncaught faults into JSON 500', async () => {
    const { app, mesh, logger } = createTestApp();
    vi.spyOn(mesh, 'search').mockRejectedValue(new Error('boom'));

    const res = await app.request('/api/search?q=budget');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: { type: 'internal', message: 'Internal server error' } });
    expect(logger.error).toHaveBeenCalledWith('Unhandled gateway error', { path: '/api/search', error: 'boom' });
  });
});
