import dotenv from 'dotenv';
import { secretsService } from '../services/secrets.service';
import { VIDEO_EXTENSIONS, DEFAULT_MOVIE_PATTERN, DEFAULT_TV_PATTERN } from './constants';

dotenv.config();

export interface EnvConfig {
  port: number;
  tmdbApiKey: string;
  tvdbApiKey: string;
  awsRegion: string;
  librariesTxtPath: string;
  consolidateCronSchedule: string;
  dryRun: boolean;
  supportedExtensions: string[];
  moviePattern: string;
  tvPattern: string;
}

function parseExtensions(value: string | undefined): string[] {
  if (!value) {
    return VIDEO_EXTENSIONS;
  }
  return value
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

// Non-sensitive config that can be loaded synchronously from .env
const baseConfig = {
  port: parseInt(process.env.PORT || '9988', 10),
  awsRegion: process.env.AWS_REGION || 'us-east-1',
  librariesTxtPath: process.env.LIBRARIES_TXT_PATH || './libraries.txt',
  consolidateCronSchedule: process.env.CONSOLIDATE_CRON_SCHEDULE ?? '0 3 * * *',
  dryRun: (process.env.DRY_RUN || 'false').toLowerCase() === 'true',
  supportedExtensions: parseExtensions(process.env.SUPPORTED_EXTENSIONS),
  moviePattern: process.env.MOVIE_PATTERN || DEFAULT_MOVIE_PATTERN,
  tvPattern: process.env.TV_PATTERN || DEFAULT_TV_PATTERN,
};

let fullConfig: EnvConfig | null = null;

/**
 * Initialize configuration by loading API keys from AWS Secrets Manager
 * (or the local .env fallback). Must be called before getConfig().
 */
export async function initConfig(): Promise<EnvConfig> {
  if (fullConfig) {
    return fullConfig;
  }

  const secrets = await secretsService.getSecrets();

  fullConfig = {
    ...baseConfig,
    tmdbApiKey: secrets.TMDB_API_KEY,
    tvdbApiKey: secrets.TVDB_API_KEY,
  };

  return fullConfig;
}

export function getConfig(): EnvConfig {
  if (!fullConfig) {
    throw new Error('Config not initialized. Call initConfig() first.');
  }
  return fullConfig;
}
