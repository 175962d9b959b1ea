import { CommunityDownloader } from './zenodo';
import { ConfigManager } from './config/configManager';
import { logger } from './utils/logger';

// Export the main classes for programmatic usage
export { CommunityDownloader, ConfigManager, logger };
export {
  CommunityLister,
  RecordFetcher,
  DownloadManager,
  MetadataJournal,
  ZenodoApi,
} from './zenodo';
export { ConfigError, HttpError } from './errors';

// Export types
export * from './types';
export type { CommunitySearchOptions, FetchLike } from './zenodo';
