import { DownloaderConfig } from '../types';

export type DefaultConfig = Omit<DownloaderConfig, 'apiKey'>;

export const defaultConfig: DefaultConfig = {
  baseUrl: 'https://zenodo.org/api',
  communityId: 'c2f742bc-82f9-4f1e-911e-d1542e88cad7', // IODP
  outputDir: './data',
  metadataFile: 'iodp_metadata.json',
  pageSize: 50,
  pageDelay: 100,
  downloadTimeout: 10 * 60 * 1000,
  verifyChecksums: true,
  debug: false,
  debugLimits: {
    maxRecords: 2,
    maxFilesPerRecord: 2,
  },
};

export const ENV_KEYS = {
  API_KEY: 'ZENODO_API_KEY',
  DEBUG: 'DEBUG',
  LOG_LEVEL: 'LOG_LEVEL',
};

export const USER_AGENT = 'IODPZenodoDownloader/1.0';
