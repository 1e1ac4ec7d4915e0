import { Command, CommanderError, InvalidArgumentError as InvalidOptionError } from 'commander';
import { loadCliConfig } from '../config/schema.js';
import type { CliConfig } from '../config/schema.js';
import {
  ConfigurationError,
  InvalidArgumentError,
  PublishError,
  RateLimitedError,
  RecordTooLargeError,
  UpstreamError,
} from '../errors.js';
import { KinesisPublisher } from '../kinesis/publisher.js';
import { run } from '../pipeline/orchestrator.js';
import type { Services } from '../pipeline/orchestrator.js';
import { GuardianClient } from '../sources/guardian.js';
import { parseDateOnly } from '../utils/date.js';

export interface CliDependencies {
  env: Record<string, string | undefined>;
  loadConfig: (env: Record<string, string | undefined>) => CliConfig;
  createServices: (config: CliConfig) => Services;
}

export const defaultCliDependencies: CliDependencies = {
  env: process.env,
  loadConfig: loadCliConfig,
  createServices: config => ({
    client: new GuardianClient({ apiKey: config.apiKey }),
    publisher: new KinesisPublisher({ streamName: config.streamName, region: config.region }),
  }),
};

function parseDateOption(value: string): Date {
  const date = parseDateOnly(value);
  if (!date) {
    throw new InvalidOptionError(`日付の形式が不正です: ${value}（YYYY-MM-DD で指定してください）`);
  }
  return date;
}

// エラー種別ごとの固定メッセージ。APIキーやストリームのARN等は出力しない
function describeError(error: unknown): string {
  if (error instanceof RateLimitedError) {
    return 'Guardian API のレート制限に達しました。しばらく待ってから再実行してください。';
  }
  if (error instanceof UpstreamError) {
    return error.status
      ? `Guardian API がエラーを返しました (HTTP ${error.status})`
      : 'Guardian API から想定外のレスポンスが返されました';
  }
  if (error instanceof InvalidArgumentError) {
    return `入力が不正です: ${error.message}`;
  }
  if (error instanceof RecordTooLargeError) {
    return `レコードサイズが上限を超えています (${error.recordSize} / ${error.maxSize} bytes)`;
  }
  if (error instanceof PublishError) {
    return 'ストリームへの送信に失敗しました';
  }
  if (error instanceof ConfigurationError) {
    return '設定エラーが発生しました';
  }
  return '予期しないエラーが発生しました';
}

async function execute(
  searchTerm: string,
  dateFrom: Date | undefined,
  deps: CliDependencies,
): Promise<number> {
  let config: CliConfig;
  try {
    config = deps.loadConfig(deps.env);
  } catch (error) {
    const message = error instanceof ConfigurationError ? error.message : String(error);
    console.error(`設定エラー: ${message}`);
    return 1;
  }

  try {
    const { client, publisher } = deps.createServices(config);
    const result = await run({ searchTerm, dateFrom, client, publisher });

    console.log(`"${searchTerm}" の記事を ${result.articlesFound}件 取得しました`);
    console.log(`${config.streamName} に ${result.articlesPublished}件 のレコードを送信しました`);
    return 0;
  } catch (error) {
    console.error(`エラー: ${describeError(error)}`);
    return 1;
  }
}

export function createProgram(deps: CliDependencies, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('guardian-stream')
    .description('Guardian の記事を検索して Kinesis ストリームに送信する')
    .version('0.1.0')
    .argument('<search-term>', '検索キーワード（例: "machine learning"）')
    .option('--date-from <date>', 'この日付以降に公開された記事に絞り込む (YYYY-MM-DD)', parseDateOption)
    .addHelpText('after', `
Examples:
  $ guardian-stream "climate change"
  $ guardian-stream "machine learning" --date-from 2024-01-01
`)
    .exitOverride()
    .configureOutput({
      writeErr: str => console.error(str.trimEnd()),
    })
    .action(async (searchTerm: string, options: { dateFrom?: Date }) => {
      onExit(await execute(searchTerm, options.dateFrom, deps));
    });

  return program;
}

/**
 * コマンドライン引数を処理し、終了コードを返す。
 * argv は process.argv と同じ形式（先頭2要素は node とスクリプトパス）。
 */
export async function runCli(argv: string[], deps: CliDependencies = defaultCliDependencies): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
