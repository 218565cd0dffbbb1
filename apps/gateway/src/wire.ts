// Core results to snake_case wire types

import type {
  DocumentContent,
  DocumentFailure,
  RecentUpdate,
  SearchResult,
  SkippedSource,
  SourceFailure,
} from '@docmesh/core';
import type * as Wire from '@docmesh/shared';

export function toWireSearchResult(item: SearchResult): Wire.SearchResult {
  return {
    id: item.id,
    title: item.title,
    snippet: item.snippet,
    url: item.url,
    source: item.source,
    last_modified: item.lastModified,
    author: item.author,
    access_level: item.accessLevel,
    metadata: item.metadata ?? {},
  };
}

export function toWireDocument(doc: DocumentContent): Wire.DocumentContent {
  return {
    id: doc.id,
    title: doc.title,
    content: doc.content,
    source: doc.source,
    url: doc.url,
    last_modified: doc.lastModified,
    author: doc.author,
    metadata: doc.metadata ?? {},
  };
}

export function toWireUpdate(update: RecentUpdate): Wire.RecentUpdate {
  return {
    id: update.id,
    title: update.title,
    snippet: update.snippet,
    url: update.url,
    source: update.source,
    last_modified: update.lastModified,
    author: update.author,
    update_type: update.updateType,
    metadata: update.metadata ?? {},
  };
}

export function toWireFailures(failures: readonly SourceFailure[]): Wire.FailedSource[] {
  return failures.map((failure) => ({
    source: failure.source,
    error_type: failure.error.type,
    message: failure.error.message,
  }));
}

export function toWireSkipped(skipped: readonly SkippedSource[]): Wire.SkippedSource[] {
  return skipped.map((entry) => ({ source: entry.source, reason: entry.reason }));
}

export function toWireFailedDocuments(failures: readonly DocumentFailure[]): Wire.FailedDocument[] {
  return failures.map((failure) => ({
    id: failure.id,
    error_type: failure.error.type,
    message: failure.error.message,
  }));
}
