import { z } from 'zod';
import {
  ArticleValidationError,
  ConfigurationError,
  InvalidArgumentError,
  RateLimitedError,
  TypeMismatchError,
  UpstreamError,
} from '../errors.js';
import { formatDateOnly } from '../utils/date.js';
import { createArticle } from './types.js';
import type { Article, SearchClient } from './types.js';

export const GUARDIAN_API_URL = 'https://content.guardianapis.com/search';
export const MAX_RESULTS = 10;

const GuardianResultSchema = z.object({
  webPublicationDate: z.string(),
  webTitle: z.string(),
  webUrl: z.string(),
});

const GuardianResponseSchema = z.object({
  response: z
    .object({
      results: z.array(z.unknown()).default([]),
    })
    .default({ results: [] }),
});

export interface GuardianClientConfig {
  apiKey: string;
  baseUrl?: string;
}

export class GuardianClient implements SearchClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(config: GuardianClientConfig) {
    if (!config.apiKey || !config.apiKey.trim()) {
      throw new ConfigurationError('Guardian API key must not be empty');
    }
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? GUARDIAN_API_URL;
  }

  /**
   * 検索語に一致する記事を新しい順に最大10件返す。
   *
   * リトライは行わない。429 は RateLimitedError、それ以外の 4xx/5xx は
   * UpstreamError になる。ネットワークエラーはそのまま伝播する。
   */
  async search(query: string, dateFrom?: Date | null): Promise<Article[]> {
    if (!query || !query.trim()) {
      throw new InvalidArgumentError('search term must not be empty');
    }

    if (dateFrom !== undefined && dateFrom !== null) {
      if (!(dateFrom instanceof Date)) {
        throw new TypeMismatchError('dateFrom must be a Date');
      }
      if (Number.isNaN(dateFrom.getTime())) {
        throw new TypeMismatchError('dateFrom must be a valid Date');
      }
    }

    const url = new URL(this.baseUrl);
    url.searchParams.set('api-key', this.apiKey);
    url.searchParams.set('q', query);
    url.searchParams.set('page-size', String(MAX_RESULTS));
    url.searchParams.set('order-by', 'newest');
    if (dateFrom) {
      url.searchParams.set('from-date', formatDateOnly(dateFrom));
    }

    // URL には api-key が含まれるためログには出さない
    console.log(`[GuardianClient] Query: "${query}"${dateFrom ? ` from ${formatDateOnly(dateFrom)}` : ''}`);

    const response = await fetch(url.toString(), {
      method: 'GET',
      headers: { Accept: 'application/json' },
    });

    if (response.status === 429) {
      console.warn('[GuardianClient] Rate limited (HTTP 429)');
      throw new RateLimitedError();
    }

    if (response.status >= 400) {
      console.error(`[GuardianClient] HTTP Error: ${response.status}`);
      throw new UpstreamError(`Guardian API error: ${response.status}`, response.status);
    }

    const body: unknown = await response.json();
    const parsed = GuardianResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError('Guardian API returned an unexpected response body');
    }

    const articles = parsed.data.response.results.map(toArticle);

    // プロバイダの並び順は信用せず、公開日時の降順に並べ直す
    articles.sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime());

    const results = articles.slice(0, MAX_RESULTS);
    console.log(`[GuardianClient] Found ${results.length} results`);
    return results;
  }
}

function toArticle(item: unknown): Article {
  const parsed = GuardianResultSchema.safeParse(item);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.') || 'item').join(', ');
    throw new ArticleValidationError(`Guardian result is missing required fields: ${fields}`);
  }
  return createArticle({
    publishedAt: parsed.data.webPublicationDate,
    title: parsed.data.webTitle,
    url: parsed.data.webUrl,
  });
}
