export interface Creator {
  name: string;
  affiliation?: string;
  orcid?: string;
}

export interface RecordFile {
  key: string;
  url: string | null; // null when the entry carries no download link
  size: number | null; // null when the entry declares no usable size
  checksum?: string; // "md5:<hex>"
}

export interface CommunityRecord {
  id: number;
  title: string;
  description?: string;
  creators: Creator[];
  publicationDate?: string;
  doi?: string;
  files: RecordFile[];
}

// Persisted shape of one record in the metadata journal
export interface JournalEntry {
  id: number;
  title: string;
  description: string | null;
  creators: Creator[];
  publication_date: string | null;
  doi: string | null;
  files: Array<{
    key: string;
    size: number | null;
    checksum: string | null;
  }>;
}

export type JournalDocument = Record<string, JournalEntry>;

export interface DebugLimits {
  maxRecords: number;
  maxFilesPerRecord: number;
}

export interface DownloaderConfig {
  apiKey: string;
  baseUrl: string;
  communityId: string;
  outputDir: string;
  metadataFile: string;
  pageSize: number;
  pageDelay: number; // ms
  downloadTimeout: number; // ms
  verifyChecksums: boolean;
  debug: boolean;
  debugLimits: DebugLimits;
}

export type FileOutcome = 'downloaded' | 'skipped' | 'failed';

export interface RecordResult {
  recordId: number;
  downloaded: number;
  skipped: number;
  failed: number;
}

export interface RunResult {
  success: boolean;
  recordsProcessed: number;
  recordsFailed: number;
  filesDownloaded: number;
  filesSkipped: number;
  filesFailed: number;
  errors: string[];
  duration: number;
}
