import 'dotenv/config';
import * as joi from 'joi';

interface EnvVars {
  PORT: number;
  API_PREFIX: string;
  CORS_ORIGIN: string;
  NODE_ENV: string;

  UPLOAD_DIR: string;
  MAX_FILE_SIZE_MB: number;
  MAX_FILES_PER_UPLOAD: number;

  RATE_LIMIT_MAX: number;
  RATE_LIMIT_WINDOW_MS: number;
  REDIS_URL: string;

  SESSION_TTL_MS: number;
  SESSION_SWEEP_INTERVAL_MS: number;
  READINESS_TIMEOUT_MS: number;
  CANCEL_INGESTION_ON_CLEANUP: boolean;

  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  RETRIEVAL_TOP_K: number;

  OPENAI_API_KEY: string;
  OPENAI_MODEL: string;
  OPENAI_EMBEDDING_MODEL: string;
}

const envsSchema = joi
  .object<EnvVars>({
    PORT: joi.number().default(3200),
    API_PREFIX: joi.string().default('/api/v1'),
    CORS_ORIGIN: joi.string().default('http://localhost:5500'),
    NODE_ENV: joi.string().default('development'),

    UPLOAD_DIR: joi.string().default('uploads'),
    MAX_FILE_SIZE_MB: joi.number().positive().default(30),
    MAX_FILES_PER_UPLOAD: joi.number().integer().min(1).default(10),

    RATE_LIMIT_MAX: joi.number().integer().min(1).default(20),
    RATE_LIMIT_WINDOW_MS: joi.number().integer().min(1).default(60_000),
    REDIS_URL: joi.string().optional().allow('').default(''),

    SESSION_TTL_MS: joi.number().integer().min(1).default(30 * 60 * 1000),
    SESSION_SWEEP_INTERVAL_MS: joi.number().integer().min(1).default(60_000),
    READINESS_TIMEOUT_MS: joi.number().integer().min(0).default(30_000),
    CANCEL_INGESTION_ON_CLEANUP: joi.boolean().default(true),

    CHUNK_SIZE: joi.number().integer().min(100).default(1000),
    CHUNK_OVERLAP: joi.number().integer().min(0).default(200),
    RETRIEVAL_TOP_K: joi.number().integer().min(1).default(4),

    OPENAI_API_KEY: joi.string().optional().allow('').default(''),
    OPENAI_MODEL: joi.string().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: joi.string().default('text-embedding-3-small'),
  })
  .unknown(true);

const { error, value } = envsSchema.validate(process.env, {
  abortEarly: false,
});
if (error) throw new Error(`Config validation error: ${error.message}`);
if (value.CHUNK_OVERLAP >= value.CHUNK_SIZE) {
  throw new Error(
    'Config validation error: "CHUNK_OVERLAP" must be less than "CHUNK_SIZE"',
  );
}

export const envs = {
  port: value.PORT,
  apiPrefix: value.API_PREFIX,
  corsOrigin: String(value.CORS_ORIGIN)
    .split(',')
    .map((o: string) => o.trim()),
  nodeEnv: value.NODE_ENV,

  uploadDir: value.UPLOAD_DIR,
  maxFileSizeBytes: value.MAX_FILE_SIZE_MB * 1024 * 1024,
  maxFilesPerUpload: value.MAX_FILES_PER_UPLOAD,

  rateLimitMax: value.RATE_LIMIT_MAX,
  rateLimitWindowMs: value.RATE_LIMIT_WINDOW_MS,
  redisUrl: value.REDIS_URL || undefined,

  sessionTtlMs: value.SESSION_TTL_MS,
  sessionSweepIntervalMs: value.SESSION_SWEEP_INTERVAL_MS,
  readinessTimeoutMs: value.READINESS_TIMEOUT_MS,
  cancelIngestionOnCleanup: value.CANCEL_INGESTION_ON_CLEANUP,

  chunkSize: value.CHUNK_SIZE,
  chunkOverlap: value.CHUNK_OVERLAP,
  retrievalTopK: value.RETRIEVAL_TOP_K,

  openAiAPIKey: value.OPENAI_API_KEY,
  openAiModel: value.OPENAI_MODEL,
  openAiEmbeddingModel: value.OPENAI_EMBEDDING_MODEL,
};
