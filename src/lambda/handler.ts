import {
  ConfigurationError,
  InvalidArgumentError,
  PublishError,
  RateLimitedError,
  UpstreamError,
} from '../errors.js';
import { run } from '../pipeline/orchestrator.js';
import type { RunOptions, RunResult } from '../pipeline/orchestrator.js';
import { parseDateOnly } from '../utils/date.js';
import { initializeFromEnvironment, ServiceContext } from './context.js';

export interface InvocationResponse {
  statusCode: number;
  body: string;
}

export type Pipeline = (options: RunOptions) => Promise<RunResult>;

type ParsedEvent =
  | { ok: true; searchTerm: string; dateFrom: Date | null }
  | { ok: false; message: string };

function successResponse(result: RunResult): InvocationResponse {
  return {
    statusCode: 200,
    body: JSON.stringify({
      articles_found: result.articlesFound,
      articles_published: result.articlesPublished,
    }),
  };
}

// エラーメッセージは固定文言のみ。下位のエラー内容は含めない
function errorResponse(statusCode: number, message: string): InvocationResponse {
  return {
    statusCode,
    body: JSON.stringify({ error: message }),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseEvent(event: unknown): ParsedEvent {
  const fields: Record<string, unknown> = isRecord(event) ? event : {};

  const searchTerm = fields.search_term;
  if (searchTerm === undefined || searchTerm === null || searchTerm === '') {
    return { ok: false, message: 'search_term is required' };
  }
  if (typeof searchTerm !== 'string') {
    return { ok: false, message: 'search_term must be a string' };
  }
  if (!searchTerm.trim()) {
    return { ok: false, message: 'search_term is required' };
  }

  const rawDate = fields.date_from;
  if (rawDate === undefined || rawDate === null) {
    return { ok: true, searchTerm, dateFrom: null };
  }
  const dateFrom = typeof rawDate === 'string' ? parseDateOnly(rawDate) : null;
  if (!dateFrom) {
    return { ok: false, message: 'Invalid date format. Use YYYY-MM-DD.' };
  }
  return { ok: true, searchTerm, dateFrom };
}

export function toErrorResponse(error: unknown): InvocationResponse {
  if (error instanceof RateLimitedError) {
    return errorResponse(429, 'Rate limit exceeded');
  }
  if (error instanceof UpstreamError) {
    return errorResponse(error.status ?? 500, 'Search provider error');
  }
  if (error instanceof InvalidArgumentError) {
    return errorResponse(400, 'Invalid request');
  }
  if (error instanceof PublishError) {
    return errorResponse(500, 'Publishing failed');
  }
  if (error instanceof ConfigurationError) {
    return errorResponse(500, 'Service configuration error');
  }
  return errorResponse(500, 'Internal server error');
}

/**
 * Lambda のイベントを run() の呼び出しに変換するハンドラを作る。
 *
 * | 状況 | statusCode |
 * |---|---|
 * | 成功 | 200 |
 * | search_term / date_from の不備 | 400 |
 * | レート制限 | 429 |
 * | 上流エラー | 上流のステータス（不明なら 500） |
 * | 設定・配信・その他のエラー | 500 |
 */
export function createHandler(
  context: ServiceContext,
  pipeline: Pipeline = run,
): (event: unknown) => Promise<InvocationResponse> {
  return async (event: unknown) => {
    const state = await context.resolve();
    if (state.status === 'failed') {
      return errorResponse(500, 'Service configuration error');
    }

    const parsed = parseEvent(event);
    if (!parsed.ok) {
      return errorResponse(400, parsed.message);
    }

    try {
      const result = await pipeline({
        searchTerm: parsed.searchTerm,
        dateFrom: parsed.dateFrom,
        client: state.services.client,
        publisher: state.services.publisher,
      });
      console.log(`[handler] Found ${result.articlesFound}, published ${result.articlesPublished}`);
      return successResponse(result);
    } catch (error) {
      console.error('[handler] Pipeline failed:', error);
      return toErrorResponse(error);
    }
  };
}

export const handler = createHandler(new ServiceContext(() => initializeFromEnvironment()));
