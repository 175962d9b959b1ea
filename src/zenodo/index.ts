export { CommunityDownloader } from './CommunityDownloader';
export { CommunityLister } from './CommunityLister';
export { RecordFetcher } from './RecordFetcher';
export { DownloadManager } from './DownloadManager';
export { MetadataJournal } from './MetadataJournal';
export { ZenodoApi } from './ZenodoApi';
export * from './types';
