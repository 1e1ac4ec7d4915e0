import { createSecretsClient, getSecret } from '../config/secrets.js';
import { loadLambdaConfig } from '../config/schema.js';
import { KinesisPublisher } from '../kinesis/publisher.js';
import type { Services } from '../pipeline/orchestrator.js';
import { GuardianClient } from '../sources/guardian.js';

export type { Services } from '../pipeline/orchestrator.js';

export type ContextState =
  | { status: 'ready'; services: Services }
  | { status: 'failed'; error: unknown };

/**
 * コンテナ内で1度だけ初期化し、以降の呼び出しで使い回すハンドル。
 * 初期化に失敗した場合はその状態を保持し、再初期化はしない。
 */
export class ServiceContext {
  private state: Promise<ContextState> | null = null;

  constructor(private readonly initialize: () => Promise<Services>) {}

  resolve(): Promise<ContextState> {
    if (!this.state) {
      this.state = this.initialize().then(
        (services): ContextState => ({ status: 'ready', services }),
        (error: unknown): ContextState => {
          const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
          console.error(`[ServiceContext] Initialization failed: ${message}`);
          return { status: 'failed', error };
        },
      );
    }
    return this.state;
  }
}

export async function initializeFromEnvironment(
  env: Record<string, string | undefined> = process.env,
): Promise<Services> {
  const config = loadLambdaConfig(env);
  const apiKey = await getSecret(config.secretName, createSecretsClient(config.region));

  return {
    client: new GuardianClient({ apiKey }),
    publisher: new KinesisPublisher({ streamName: config.streamName, region: config.region }),
  };
}
