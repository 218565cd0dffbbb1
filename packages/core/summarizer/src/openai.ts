/**
 * OpenAI-backed summarizer
 */

import OpenAI from 'openai';
import {
  defaultLogger,
  type DocumentContent,
  type Logger,
  type Summarizer,
  type SummaryResult,
} from '@docmesh/aggregator';
import { MAX_KEY_POINTS, toSourceRefs } from './refs.js';

export interface OpenAISummarizerConfig {
  apiKey: string;
  model?: string;
  baseURL?: string;
  /** Abort the completion after this many ms (default 30000) */
  timeoutMs?: number;
  temperature?: number;
  logger?: Logger;
}

const SYSTEM_PROMPT =
  'You summarize workplace documents. Reply with a JSON object of the form ' +
  '{"summary": string, "key_points": string[]} and nothing else.';

export function buildSummaryPrompt(documents: readonly DocumentContent[], maxLength: number): string {
  const sections = documents.map((doc, index) => `[${index + 1}] ${doc.title} (${doc.id})\n${doc.content}`);
  return [
    `Summarize the documents below in at most ${maxLength} characters.`,
    `List at most ${MAX_KEY_POINTS} key points.`,
    '',
    ...sections,
  ].join('\n');
}

/**
 * Parse the model's reply. Code fences around the JSON are tolerated.
 */
export function parseSummaryResponse(content: string): { summary: string; keyPoints: string[] } {
  const cleaned = content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch {
    throw new Error('Summarizer returned an unparsable response');
  }

  if (typeof parsed !== 'object' || parsed === null || !('summary' in parsed) || typeof parsed.summary !== 'string') {
    throw new Error('Summarizer response is missing a summary');
  }

  const rawPoints = 'key_points' in parsed ? parsed.key_points : [];
  const keyPoints = Array.isArray(rawPoints)
    ? rawPoints.filter((point): point is string => typeof point === 'string' && point.trim().length > 0)
    : [];

  return { summary: parsed.summary, keyPoints };
}

export class OpenAISummarizer implements Summarizer {
  private client: OpenAI;
  private model: string;
  private timeoutMs: number;
  private temperature: number;
  private logger: Logger;

  constructor(config: OpenAISummarizerConfig) {
    if (!config.apiKey) {
      throw new Error('OpenAI API key is required');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
    this.model = config.model || 'gpt-4o-mini';
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.temperature = config.temperature ?? 0.2;
    this.logger = config.logger ?? defaultLogger;
  }

  async summarize(documents: DocumentContent[], maxLength: number): Promise<SummaryResult> {
    if (documents.length === 0) {
      return { summary: '', keyPoints: [], sourceDocuments: [] };
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildSummaryPrompt(documents, maxLength) },
          ],
          temperature: this.temperature,
          response_format: { type: 'json_object' },
        },
        { signal: controller.signal }
      );

      const content = completion.choices[0]?.message.content ?? '';
      const parsed = parseSummaryResponse(content);

      this.logger.debug('OpenAI summary generated', {
        model: this.model,
        documents: documents.length,
        length: parsed.summary.length,
      });

      return {
        summary: parsed.summary.slice(0, maxLength),
        keyPoints: parsed.keyPoints.slice(0, MAX_KEY_POINTS),
        sourceDocuments: toSourceRefs(documents),
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
