import fs from 'fs-extra';
import path from 'path';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { logger } from '../utils/logger';
import { FileUtils } from '../utils/fileUtils';
import { describeError } from '../errors';
import { CommunityRecord, FileOutcome, RecordFile, RecordResult } from '../types';
import { parseChecksum } from './recordParser';
import { ZenodoApi } from './ZenodoApi';

const VERIFIABLE_ALGORITHMS = ['md5', 'sha1', 'sha256', 'sha512'];

export interface DownloadOptions {
  downloadTimeout: number; // ms without any data before a transfer is aborted
  verifyChecksums: boolean;
}

type UsableFile = RecordFile & { url: string; size: number };

function isUsable(file: RecordFile): file is UsableFile {
  return file.url !== null && file.size !== null;
}

export class DownloadManager {
  private completed = 0;
  private skipped = 0;
  private failed = new Map<string, string>();

  constructor(
    private api: ZenodoApi,
    private options: DownloadOptions
  ) {}

  /**
   * Directory holding a record's files: <outputDir>/record_<id>/<sanitized title>.
   */
  static recordDir(outputDir: string, record: Pick<CommunityRecord, 'id' | 'title'>): string {
    return path.join(outputDir, `record_${record.id}`, FileUtils.sanitizeTitle(record.title));
  }

  async downloadRecordFiles(
    record: CommunityRecord,
    outputDir: string,
    maxFiles?: number
  ): Promise<RecordResult> {
    const result: RecordResult = { recordId: record.id, downloaded: 0, skipped: 0, failed: 0 };

    const files = maxFiles !== undefined ? record.files.slice(0, maxFiles) : record.files;
    if (files.length < record.files.length) {
      logger.item(`Limiting to ${files.length} of ${record.files.length} files`);
    }

    if (files.length === 0) {
      logger.item('No files to download');
      return result;
    }

    const targetDir = DownloadManager.recordDir(outputDir, record);
    for (const file of files) {
      const outcome = await this.downloadFile(file, targetDir);
      result[outcome]++;
    }

    logger.item(
      `Downloaded ${result.downloaded}, skipped ${result.skipped}, failed ${result.failed} of ${files.length} files`
    );
    return result;
  }

  /**
   * Brings one file up to date in targetDir. Never throws: failures are logged
   * and reported as 'failed'.
   */
  async downloadFile(file: RecordFile, targetDir: string): Promise<FileOutcome> {
    const localPath = path.join(targetDir, file.key);
    if (path.dirname(localPath) !== path.normalize(targetDir)) {
      const errorMsg = `Refusing file key outside the record directory: ${file.key}`;
      logger.error(errorMsg);
      this.failed.set(localPath, errorMsg);
      return 'failed';
    }

    if (!isUsable(file)) {
      const missing = file.url === null ? 'no download link' : 'no declared size';
      const errorMsg = `Cannot download ${file.key}: entry has ${missing}`;
      logger.error(errorMsg);
      this.failed.set(localPath, errorMsg);
      return 'failed';
    }

    let started = false;
    try {
      await FileUtils.ensureDir(targetDir);

      if (await this.isSatisfied(file, localPath)) {
        logger.item(`Skipping ${file.key} (already exists)`);
        this.skipped++;
        return 'skipped';
      }

      logger.item(`Downloading ${file.key} (${file.size} bytes)...`);
      started = true;
      await this.streamToDisk(file, localPath);
      await this.verifyDownload(file, localPath);

      logger.item(`Downloaded ${file.key}`, '✓');
      this.completed++;
      return 'downloaded';
    } catch (error) {
      const errorMsg = `Failed to download ${file.key}: ${describeError(error)}`;
      logger.error(errorMsg);
      this.failed.set(localPath, errorMsg);
      if (started) {
        await this.cleanupPartialDownload(localPath);
      }
      return 'failed';
    }
  }

  private async isSatisfied(file: UsableFile, localPath: string): Promise<boolean> {
    const localSize = await FileUtils.getFileSize(localPath);
    return localSize === file.size;
  }

  /**
   * The timeout is an idle timer: it is re-armed whenever a chunk arrives, so
   * large files may take as long as they need while a stalled transfer is aborted.
   */
  private async streamToDisk(file: UsableFile, localPath: string): Promise<void> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const rearm = () => {
      clearTimeout(timer);
      timer = setTimeout(() => controller.abort(), this.options.downloadTimeout);
    };

    rearm();
    try {
      const response = await this.api.openDownload(file.url, controller.signal);
      const watchdog = new Transform({
        transform(chunk, _encoding, callback) {
          rearm();
          callback(null, chunk);
        },
      });
      await pipeline(response.body, watchdog, fs.createWriteStream(localPath, { flags: 'w' }));
    } finally {
      clearTimeout(timer);
    }
  }

  private async verifyDownload(file: UsableFile, localPath: string): Promise<void> {
    const size = await FileUtils.getFileSize(localPath);
    if (size !== file.size) {
      throw new Error(`Size mismatch: expected ${file.size} bytes, got ${size ?? 0}`);
    }

    if (!this.options.verifyChecksums) return;

    const checksum = parseChecksum(file.checksum);
    if (!checksum) return;
    if (!VERIFIABLE_ALGORITHMS.includes(checksum.algorithm)) {
      logger.debug(`Cannot verify ${checksum.algorithm} checksum for ${file.key}`);
      return;
    }

    const hash = await FileUtils.getFileHash(localPath, checksum.algorithm);
    if (hash !== checksum.digest) {
      throw new Error(`Checksum mismatch: expected ${checksum.digest}, got ${hash}`);
    }
  }

  private async cleanupPartialDownload(localPath: string): Promise<void> {
    try {
      // only regular files; a directory squatting on the path is left alone
      if ((await FileUtils.getFileSize(localPath)) !== null) {
        await FileUtils.deleteFile(localPath);
      }
    } catch (error) {
      logger.warn(`Could not remove partial download ${localPath}:`, error);
    }
  }

  getStats() {
    return {
      completed: this.completed,
      skipped: this.skipped,
      failed: this.failed.size,
      failedFiles: Array.from(this.failed.entries()),
    };
  }
}
