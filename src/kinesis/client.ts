import { KinesisClient } from '@aws-sdk/client-kinesis';

export const DEFAULT_REGION = 'eu-west-2';

export function createKinesisClient(region: string = DEFAULT_REGION): KinesisClient {
  return new KinesisClient({ region });
}
