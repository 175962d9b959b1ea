import { logger } from '../utils/logger';
import { DownloaderConfig, RunResult } from '../types';
import { CommunityLister } from './CommunityLister';
import { DownloadManager } from './DownloadManager';
import { MetadataJournal } from './MetadataJournal';
import { RecordFetcher } from './RecordFetcher';
import { FetchLike } from './types';
import { ZenodoApi } from './ZenodoApi';

/**
 * Downloads every record of one community, one record and one file at a time.
 *
 * Re-running is cheap: files already on disk with their declared size are skipped
 * without a request, and the journal is rebuilt as records complete.
 */
export class CommunityDownloader {
  private lister: CommunityLister;
  private fetcher: RecordFetcher;
  private downloadManager: DownloadManager;
  private journal: MetadataJournal;

  constructor(
    private config: DownloaderConfig,
    fetchImpl?: FetchLike
  ) {
    const api = new ZenodoApi(config.baseUrl, config.apiKey, fetchImpl);
    this.lister = new CommunityLister(api);
    this.fetcher = new RecordFetcher(api);
    this.downloadManager = new DownloadManager(api, {
      downloadTimeout: config.downloadTimeout,
      verifyChecksums: config.verifyChecksums,
    });
    this.journal = new MetadataJournal(config.outputDir, config.metadataFile);
  }

  /**
   * Runs the whole community. Record and file failures are collected in the result;
   * a listing failure is thrown.
   */
  async run(): Promise<RunResult> {
    const startTime = Date.now();
    const limits = this.config.debug ? this.config.debugLimits : undefined;
    const errors: string[] = [];
    const result: RunResult = {
      success: false,
      recordsProcessed: 0,
      recordsFailed: 0,
      filesDownloaded: 0,
      filesSkipped: 0,
      filesFailed: 0,
      errors,
      duration: 0,
    };

    logger.section(`Fetching records of community ${this.config.communityId}`);
    if (limits) {
      logger.warn(
        `Debug mode: at most ${limits.maxRecords} records and ${limits.maxFilesPerRecord} files per record`
      );
    }

    const recordIds = this.lister.listRecordIds({
      communityId: this.config.communityId,
      pageSize: this.config.pageSize,
      maxRecords: limits?.maxRecords,
      pageDelay: this.config.pageDelay,
    });

    let position = 0;
    for await (const recordId of recordIds) {
      position++;
      logger.section(`[${position}] Processing record ${recordId}`);

      const record = await this.fetcher.fetchRecord(recordId);
      if (!record) {
        result.recordsFailed++;
        errors.push(`Record ${recordId} could not be fetched`);
        continue;
      }

      logger.item(`${record.title} (${record.files.length} files)`);
      const files = await this.downloadManager.downloadRecordFiles(
        record,
        this.config.outputDir,
        limits?.maxFilesPerRecord
      );

      result.filesDownloaded += files.downloaded;
      result.filesSkipped += files.skipped;
      result.filesFailed += files.failed;
      result.recordsProcessed++;

      this.journal.record(record);
      await this.journal.save();
    }

    // written even when nothing was listed, so the file always exists after a run
    await this.journal.save();

    for (const [, message] of this.downloadManager.getStats().failedFiles) {
      errors.push(message);
    }

    result.success = errors.length === 0;
    result.duration = Date.now() - startTime;
    logger.success(
      `Processed ${result.recordsProcessed} records; metadata saved to ${this.journal.getPath()}`
    );
    return result;
  }
}
