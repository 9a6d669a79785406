// cutshift/backend/src/config/environment.ts
import { MEDIA_EXTENT_POLICIES, MediaExtentPolicy } from '../resolve/resolve-sequence';

const MB = 1024 * 1024;

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function readMediaExtent(): MediaExtentPolicy {
  const raw = process.env.MEDIA_EXTENT_POLICY?.trim().toLowerCase();
  return MEDIA_EXTENT_POLICIES.find((policy) => policy === raw) ?? 'unbounded';
}

const port = readInt('PORT', 8000);

export const environment = {
  production: process.env.NODE_ENV === 'production',
  port: port,
  apiPrefix: 'api',

  service: {
    name: 'cutshift',
    title: 'DRP J/L Cut Tool API',
    version: '1.0.0',
  },

  cors: {
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'Authorization'],
    exposedHeaders: ['Content-Disposition', 'X-Cuts-Applied', 'X-Total-Boundaries', 'X-Cut-Type', 'X-Offset', 'X-Run-Id'],
  },

  limits: {
    maxFileSize: readInt('MAX_FILE_SIZE', 50 * MB),
    maxExtractedSize: readInt('MAX_EXTRACTED_SIZE', 200 * MB),
    maxOffsetFrames: readInt('MAX_OFFSET_FRAMES', 100),
    allowedExtensions: ['.drp'],
  },

  // per client, on POST /process
  rateLimit: {
    limit: readInt('RATE_LIMIT_MAX', 5),
    ttl: readInt('RATE_LIMIT_TTL_MS', 60 * 60 * 1000),
  },

  resolve: {
    mediaExtent: readMediaExtent(),
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    directory: process.env.LOG_DIR,
  },
};

export type Environment = typeof environment;
