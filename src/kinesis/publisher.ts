import { PutRecordCommand } from '@aws-sdk/client-kinesis';
import type { KinesisClient } from '@aws-sdk/client-kinesis';
import { ConfigurationError, PublishError, RecordTooLargeError } from '../errors.js';
import type { Article } from '../sources/types.js';
import { createKinesisClient, DEFAULT_REGION } from './client.js';
import { serializeArticle } from './types.js';
import type { ArticlePublisher } from './types.js';

// Kinesis の1レコードあたりの上限 (1 MiB)
export const MAX_RECORD_SIZE = 1024 * 1024;

export interface KinesisPublisherConfig {
  streamName: string;
  region?: string;
  client?: Pick<KinesisClient, 'send'>;
}

export class KinesisPublisher implements ArticlePublisher {
  readonly streamName: string;
  private readonly client: Pick<KinesisClient, 'send'>;
  private readonly encoder = new TextEncoder();

  constructor(config: KinesisPublisherConfig) {
    if (!config.streamName || !config.streamName.trim()) {
      throw new ConfigurationError('Stream name must not be empty or whitespace');
    }
    this.streamName = config.streamName;
    this.client = config.client ?? createKinesisClient(config.region ?? DEFAULT_REGION);
  }

  /**
   * 記事を1件ずつ順番に PutRecord する。
   *
   * 最初に失敗したレコードで中断し、それ以降の記事は送信しない。
   * 戻り値は送信に成功したレコード数。
   */
  async publish(articles: Article | Article[]): Promise<number> {
    const batch = Array.isArray(articles) ? articles : [articles];
    if (batch.length === 0) {
      return 0;
    }

    let publishedCount = 0;
    for (const article of batch) {
      await this.publishSingle(article);
      publishedCount++;
    }

    console.log(`[KinesisPublisher] Published ${publishedCount} records`);
    return publishedCount;
  }

  private async publishSingle(article: Article): Promise<void> {
    const data = this.encoder.encode(serializeArticle(article));

    if (data.byteLength > MAX_RECORD_SIZE) {
      console.error(`[KinesisPublisher] Record too large: ${data.byteLength} bytes`);
      throw new RecordTooLargeError(data.byteLength, MAX_RECORD_SIZE);
    }

    try {
      await this.client.send(
        new PutRecordCommand({
          StreamName: this.streamName,
          Data: data,
          PartitionKey: article.url,
        })
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[KinesisPublisher] PutRecord failed: ${message}`);
      throw new PublishError('Failed to publish record to stream', { cause: error });
    }
  }
}
