import { S3Client } from '@aws-sdk/client-s3';
import { IStorageRepository } from './interface';
import { FileStorageRepository, S3StorageRepository } from './repository';

export type FileArchiveConfig = { type: 'file'; path: string };

export type S3ArchiveConfig = {
  type: 's3';
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
  fileName: string;
};

export type Config = {
  environment: string;
  archive: FileArchiveConfig | S3ArchiveConfig;
  metrics: { apiToken?: string; url?: string };
  verifyTiles: boolean;
};

type Env = Record<string, string | undefined>;

function parseBoolean(name: string, value: string | undefined): boolean {
  if (value === undefined || value === '' || value === 'false') {
    return false;
  }
  if (value === 'true') {
    return true;
  }
  throw new Error(`${name} must be "true" or "false", got "${value}"`);
}

function loadArchiveConfig(env: Env): FileArchiveConfig | S3ArchiveConfig {
  const { PMTILES_FILE_PATH, S3_ENDPOINT, S3_REGION, S3_ACCESS_KEY, S3_SECRET_KEY, BUCKET_KEY, FILE_NAME } = env;
  if (PMTILES_FILE_PATH) {
    return { type: 'file', path: PMTILES_FILE_PATH };
  }

  const required = { S3_ENDPOINT, S3_ACCESS_KEY, S3_SECRET_KEY, BUCKET_KEY, FILE_NAME };
  const missing = Object.entries(required)
    .filter(([, value]) => !value)
    .map(([key]) => key);
  if (!S3_ENDPOINT || !S3_ACCESS_KEY || !S3_SECRET_KEY || !BUCKET_KEY || !FILE_NAME) {
    throw new Error(`Missing environment variables: set PMTILES_FILE_PATH, or ${missing.join(', ')}`);
  }

  return {
    type: 's3',
    endpoint: S3_ENDPOINT,
    region: S3_REGION || 'auto',
    accessKeyId: S3_ACCESS_KEY,
    secretAccessKey: S3_SECRET_KEY,
    bucket: BUCKET_KEY,
    fileName: FILE_NAME,
  };
}

export function loadConfig(env: Env = process.env): Config {
  return {
    environment: env.ENVIRONMENT || 'dev',
    archive: loadArchiveConfig(env),
    metrics: { apiToken: env.METRICS_API_TOKEN, url: env.METRICS_URL },
    verifyTiles: parseBoolean('VERIFY_TILES', env.VERIFY_TILES),
  };
}

export function createStorageRepository(config: Config['archive']): IStorageRepository {
  if (config.type === 'file') {
    return new FileStorageRepository(config.path);
  }

  const client = new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  });
  return new S3StorageRepository(client, config.bucket, config.fileName);
}
