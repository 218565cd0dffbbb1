import type { DocumentContent, SourceId } from '@docmesh/aggregator';

export function doc(source: SourceId, id: string, title: string, content: string): DocumentContent {
  return {
    id: `${source}:${id}`,
    title,
    content,
    source,
    url: `https://${source}.example.com/${id}`,
    lastModified: '2024-05-01T10:00:00.000Z',
    author: 'Test Author',
  };
}
