import type { DocumentContent, SourceDocumentRef } from '@docmesh/aggregator';

export const MAX_KEY_POINTS = 5;

export function toSourceRefs(documents: readonly DocumentContent[]): SourceDocumentRef[] {
  return documents.map((doc) => ({ id: doc.id, title: doc.title, source: doc.source }));
}
