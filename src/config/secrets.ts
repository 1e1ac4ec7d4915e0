import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import type { GetSecretValueCommandOutput } from '@aws-sdk/client-secrets-manager';
import { ConfigurationError } from '../errors.js';

export function createSecretsClient(region: string): SecretsManagerClient {
  return new SecretsManagerClient({ region });
}

// Secrets Manager からシークレット文字列を1件取得する
export async function getSecret(
  secretName: string,
  client: Pick<SecretsManagerClient, 'send'>,
): Promise<string> {
  let response: GetSecretValueCommandOutput;
  try {
    response = await client.send(new GetSecretValueCommand({ SecretId: secretName }));
  } catch (error) {
    throw new ConfigurationError('Failed to retrieve secret', { cause: error });
  }

  const value = response.SecretString;
  if (!value || !value.trim()) {
    throw new ConfigurationError('Secret has no string value');
  }
  return value;
}
