/**
 * Extractive summarizer: no model, just the documents' own text
 */

import type { DocumentContent, Summarizer, SummaryResult } from '@docmesh/aggregator';
import { MAX_KEY_POINTS, toSourceRefs } from './refs.js';

/**
 * First sentence of a text, or its first line when there is no sentence end
 */
export function firstSentence(text: string): string {
  const trimmed = text.trim();
  const match = /^[\s\S]*?[.!?](?=\s|$)/.exec(trimmed);
  const sentence = match ? match[0] : trimmed.split('\n')[0];
  return sentence.replace(/\s+/g, ' ').trim();
}

export class ExtractiveSummarizer implements Summarizer {
  async summarize(documents: DocumentContent[], maxLength: number): Promise<SummaryResult> {
    const combined = documents.map((doc) => doc.content).join(' ');

    return {
      summary: combined.slice(0, Math.max(maxLength, 0)),
      keyPoints: documents
        .map((doc) => firstSentence(doc.content))
        .filter((point) => point.length > 0)
        .slice(0, MAX_KEY_POINTS),
      sourceDocuments: toSourceRefs(documents),
    };
  }
}
