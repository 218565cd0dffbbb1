// Wire types shared by the gateway and its clients

export type DocumentSource = 'gdrive' | 'notion' | 'slack' | 'confluence'

export type AccessLevel = 'owner' | 'editor' | 'viewer' | 'restricted'

export type UpdateType = 'created' | 'modified' | 'shared' | 'commented'

export interface SearchResult {
  id: string
  title: string
  snippet: string
  url: string
  source: DocumentSource
  last_modified: string
  author: string
  access_level: AccessLevel
  metadata: Record<string, unknown>
}

export interface DocumentContent {
  id: string
  title: string
  content: string
  source: DocumentSource
  url: string
  last_modified: string
  author: string
  metadata: Record<string, unknown>
}

export interface RecentUpdate {
  id: string
  title: string
  snippet: string
  url: string
  source: DocumentSource
  last_modified: string
  author: string
  update_type: UpdateType
  metadata: Record<string, unknown>
}

export interface SourceDocument {
  id: string
  title: string
  source: DocumentSource
}

export interface FailedSource {
  source: DocumentSource
  error_type: string
  message: string
}

export interface SkippedSource {
  source: DocumentSource
  reason: 'permission_denied' | 'unsupported'
}

export interface SearchResponse {
  query: string
  results: SearchResult[]
  total_count: number
  failed_sources: FailedSource[]
  skipped_sources: SkippedSource[]
  cached: boolean
}

export interface RecentUpdatesResponse {
  days: number
  updates: RecentUpdate[]
  total_count: number
  failed_sources: FailedSource[]
  skipped_sources: SkippedSource[]
  cached: boolean
}

export interface SummarizeRequest {
  document_ids: string[]
  max_length?: number
}

export interface FailedDocument {
  id: string
  error_type: string
  message: string
}

export interface SummarizeResponse {
  summary: string
  key_points: string[]
  source_documents: SourceDocument[]
  failed_documents: FailedDocument[]
  cached: boolean
}

export interface ErrorResponse {
  error: {
    type: string
    message: string
    field?: string
  }
}

export interface HealthResponse {
  status: 'healthy'
  version: string
  timestamp: string
}
