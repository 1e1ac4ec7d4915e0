import { beforeEach, describe, expect, it, vi } from 'vitest';
import { loadCliConfig } from '../config/schema.js';
import { PublishError, RateLimitedError, UpstreamError } from '../errors.js';
import type { ArticlePublisher } from '../kinesis/types.js';
import type { SearchClient } from '../sources/types.js';
import { createArticle } from '../sources/types.js';
import { formatDateOnly } from '../utils/date.js';
import { runCli } from './search.js';
import type { CliDependencies } from './search.js';

const articles = [
  createArticle({
    publishedAt: '2024-01-15T10:30:00Z',
    title: 'Climate change impacts on agriculture',
    url: 'https://www.theguardian.com/environment/2024/jan/15/climate-agriculture',
  }),
  createArticle({
    publishedAt: '2024-01-14T08:00:00Z',
    title: 'New renewable energy targets announced',
    url: 'https://www.theguardian.com/environment/2024/jan/14/renewable-targets',
  }),
];

describe('runCli', () => {
  const client = { search: vi.fn<SearchClient['search']>() };
  const publisher = { publish: vi.fn<ArticlePublisher['publish']>() };
  const createServices = vi.fn<CliDependencies['createServices']>();
  let deps: CliDependencies;

  beforeEach(() => {
    client.search.mockReset();
    publisher.publish.mockReset();
    createServices.mockReset();
    createServices.mockReturnValue({ client, publisher });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    deps = {
      env: { GUARDIAN_API_KEY: 'test-api-key', KINESIS_STREAM_NAME: 'test-stream' },
      loadConfig: loadCliConfig,
      createServices,
    };
  });

  function cli(...args: string[]): Promise<number> {
    return runCli(['node', 'guardian-stream', ...args], deps);
  }

  it('searches, publishes and reports the counts', async () => {
    client.search.mockResolvedValue(articles);
    publisher.publish.mockResolvedValue(2);

    await expect(cli('climate change')).resolves.toBe(0);

    expect(client.search).toHaveBeenCalledWith('climate change', undefined);
    expect(console.log).toHaveBeenCalledWith('"climate change" の記事を 2件 取得しました');
    expect(console.log).toHaveBeenCalledWith('test-stream に 2件 のレコードを送信しました');
  });

  it('builds services from the loaded config', async () => {
    client.search.mockResolvedValue([]);

    await cli('climate change');

    expect(createServices).toHaveBeenCalledWith({
      apiKey: 'test-api-key',
      streamName: 'test-stream',
      region: 'eu-west-2',
    });
  });

  it('passes --date-from as a date', async () => {
    client.search.mockResolvedValue([]);

    await expect(cli('machine learning', '--date-from', '2024-01-15')).resolves.toBe(0);

    const dateFrom = client.search.mock.calls[0][1];
    expect(dateFrom ? formatDateOnly(dateFrom) : null).toBe('2024-01-15');
  });

  it('reports zero results without publishing', async () => {
    client.search.mockResolvedValue([]);

    await expect(cli('xyznonexistent')).resolves.toBe(0);

    expect(publisher.publish).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith('test-stream に 0件 のレコードを送信しました');
  });

  it('rejects a malformed --date-from before loading config', async () => {
    await expect(cli('climate', '--date-from', '2024/01/15')).resolves.toBe(1);

    expect(createServices).not.toHaveBeenCalled();
  });

  it('requires a search term', async () => {
    await expect(cli()).resolves.toBe(1);

    expect(createServices).not.toHaveBeenCalled();
  });

  it('exits 1 when configuration is missing', async () => {
    deps.env = { KINESIS_STREAM_NAME: 'test-stream' };

    await expect(cli('climate')).resolves.toBe(1);

    expect(console.error).toHaveBeenCalledWith('設定エラー: GUARDIAN_API_KEY is not set');
    expect(createServices).not.toHaveBeenCalled();
  });

  it('exits 1 when rate limited', async () => {
    client.search.mockRejectedValue(new RateLimitedError());

    await expect(cli('climate')).resolves.toBe(1);

    expect(console.error).toHaveBeenCalledWith(
      'エラー: Guardian API のレート制限に達しました。しばらく待ってから再実行してください。'
    );
    expect(publisher.publish).not.toHaveBeenCalled();
  });

  it('exits 1 on an upstream error', async () => {
    client.search.mockRejectedValue(new UpstreamError('Guardian API error: 503', 503));

    await expect(cli('climate')).resolves.toBe(1);

    expect(console.error).toHaveBeenCalledWith('エラー: Guardian API がエラーを返しました (HTTP 503)');
  });

  it('exits 1 on a publish failure without printing the cause', async () => {
    client.search.mockResolvedValue(articles);
    publisher.publish.mockRejectedValue(
      new PublishError('Failed to publish record to stream', {
        cause: new Error('arn:aws:kinesis:eu-west-2:123456789012:stream/test-stream'),
      })
    );

    await expect(cli('climate')).resolves.toBe(1);

    expect(console.error).toHaveBeenCalledWith('エラー: ストリームへの送信に失敗しました');
    expect(vi.mocked(console.error).mock.calls.flat().join('\n')).not.toContain('arn:aws');
  });
});
