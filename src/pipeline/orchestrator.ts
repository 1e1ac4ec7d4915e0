import type { ArticlePublisher } from '../kinesis/types.js';
import type { SearchClient } from '../sources/types.js';

export interface Services {
  client: SearchClient;
  publisher: ArticlePublisher;
}

export interface RunOptions {
  searchTerm: string;
  dateFrom?: Date | null;
  client: SearchClient;
  publisher: ArticlePublisher;
}

export interface RunResult {
  articlesFound: number;
  articlesPublished: number;
}

/**
 * 検索→配信を1回だけ実行する。
 *
 * リトライや例外の変換は行わない。どちらのステップのエラーもそのまま
 * 呼び出し元に伝播し、検索が失敗した場合 publisher は呼ばれない。
 */
export async function run({ searchTerm, dateFrom, client, publisher }: RunOptions): Promise<RunResult> {
  const articles = await client.search(searchTerm, dateFrom);

  // 0件なら空の publish 呼び出しはしない
  const articlesPublished = articles.length > 0 ? await publisher.publish(articles) : 0;

  return {
    articlesFound: articles.length,
    articlesPublished,
  };
}
