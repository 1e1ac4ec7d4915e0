import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { ArticleValidationError } from '../errors.js';

export interface Article {
  readonly publishedAt: Date;      // 公開日時
  readonly title: string;
  readonly url: string;            // 記事URL（Kinesis のパーティションキーにも使う）
  readonly contentPreview?: string;
}

const PublishedAtSchema = z.union([
  z.date(),
  z
    .string()
    .refine(value => isValid(parseISO(value)), { message: 'must be an ISO-8601 timestamp' })
    .transform(value => parseISO(value)),
]);

export const ArticleSchema = z.object({
  publishedAt: PublishedAtSchema,
  title: z.string().refine(value => value.trim().length > 0, { message: 'must not be empty' }),
  url: z.string().url(),
  contentPreview: z.string().optional(),
});

export type ArticleInput = z.input<typeof ArticleSchema>;

// 検証済みの Article を生成する。不正なフィールドがあれば部分的な値は返さない
export function createArticle(input: ArticleInput): Article {
  const result = ArticleSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || 'article'}: ${issue.message}`)
      .join(', ');
    throw new ArticleValidationError(`Invalid article (${detail})`);
  }

  const { title, url, contentPreview } = result.data;
  const publishedAt = new Date(result.data.publishedAt.getTime());
  const article: Article = contentPreview === undefined
    ? { publishedAt, title, url }
    : { publishedAt, title, url, contentPreview };
  return Object.freeze(article);
}

// 検索クライアントの共通インターフェース
export interface SearchClient {
  search(query: string, dateFrom?: Date | null): Promise<Article[]>;
}
