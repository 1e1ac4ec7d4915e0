import type { Article } from '../sources/types.js';

// Kinesis に送る1レコード分のJSON表現
export interface ArticleRecord {
  publishedAt: string;
  title: string;
  url: string;
  contentPreview: string | null;
}

export function toArticleRecord(article: Article): ArticleRecord {
  return {
    publishedAt: article.publishedAt.toISOString(),
    title: article.title,
    url: article.url,
    contentPreview: article.contentPreview ?? null,
  };
}

export function serializeArticle(article: Article): string {
  return JSON.stringify(toArticleRecord(article));
}

// 配信先の共通インターフェース
export interface ArticlePublisher {
  publish(articles: Article | Article[]): Promise<number>;
}
