import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_REGION } from '../kinesis/client.js';

// 未設定・空文字・空白のみの値を拒否する
function requiredSetting(name: string) {
  return z
    .string({ required_error: `${name} is not set` })
    .refine(value => value.trim().length > 0, { message: `${name} must not be empty or whitespace` });
}

const RegionSchema = z
  .string()
  .optional()
  .transform(value => value?.trim() || DEFAULT_REGION);

// CLI 用設定（APIキーを環境変数から直接読む）
const CliEnvSchema = z
  .object({
    GUARDIAN_API_KEY: requiredSetting('GUARDIAN_API_KEY'),
    KINESIS_STREAM_NAME: requiredSetting('KINESIS_STREAM_NAME'),
    AWS_REGION: RegionSchema,
  })
  .transform(env => ({
    apiKey: env.GUARDIAN_API_KEY,
    streamName: env.KINESIS_STREAM_NAME,
    region: env.AWS_REGION,
  }));

// Lambda 用設定（APIキーは Secrets Manager から取得する）
const LambdaEnvSchema = z
  .object({
    GUARDIAN_API_KEY_SECRET_NAME: requiredSetting('GUARDIAN_API_KEY_SECRET_NAME'),
    KINESIS_STREAM_NAME: requiredSetting('KINESIS_STREAM_NAME'),
    AWS_REGION: RegionSchema,
  })
  .transform(env => ({
    secretName: env.GUARDIAN_API_KEY_SECRET_NAME,
    streamName: env.KINESIS_STREAM_NAME,
    region: env.AWS_REGION,
  }));

export type CliConfig = z.infer<typeof CliEnvSchema>;
export type LambdaConfig = z.infer<typeof LambdaEnvSchema>;

type Env = Record<string, string | undefined>;

function parseEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, env: Env): T {
  const result = schema.safeParse(env);
  if (!result.success) {
    // 値そのものは含めず、変数名とエラー内容だけを返す
    const detail = result.error.issues.map(issue => issue.message).join('; ');
    throw new ConfigurationError(detail);
  }
  return result.data;
}

export function loadCliConfig(env: Env = process.env): CliConfig {
  return parseEnv(CliEnvSchema, env);
}

export function loadLambdaConfig(env: Env = process.env): LambdaConfig {
  return parseEnv(LambdaEnvSchema, env);
}
