import path from 'path';
import { FileUtils } from '../utils/fileUtils';
import { logger } from '../utils/logger';
import { CommunityRecord, JournalDocument, JournalEntry } from '../types';

/**
 * In-memory map of record id to metadata, written wholesale to one JSON file.
 * Starts empty each run; the file always reflects the records fetched so far.
 */
export class MetadataJournal {
  private journalFile: string;
  private entries = new Map<number, JournalEntry>();

  constructor(outputDir: string, fileName: string) {
    this.journalFile = path.join(outputDir, fileName);
  }

  static toEntry(record: CommunityRecord): JournalEntry {
    return {
      id: record.id,
      title: record.title,
      description: record.description ?? null,
      creators: record.creators,
      publication_date: record.publicationDate ?? null,
      doi: record.doi ?? null,
      files: record.files.map(file => ({
        key: file.key,
        size: file.size,
        checksum: file.checksum ?? null,
      })),
    };
  }

  record(record: CommunityRecord): void {
    this.entries.set(record.id, MetadataJournal.toEntry(record));
  }

  get size(): number {
    return this.entries.size;
  }

  toJSON(): JournalDocument {
    const document: JournalDocument = {};
    for (const [id, entry] of this.entries) {
      document[String(id)] = entry;
    }
    return document;
  }

  async save(): Promise<void> {
    try {
      await FileUtils.ensureDir(path.dirname(this.journalFile));
      await FileUtils.writeJSON(this.journalFile, this.toJSON());
      logger.debug(`Metadata saved to ${this.journalFile} (${this.entries.size} records)`);
    } catch (error) {
      logger.error('Failed to save metadata journal:', error);
      throw error;
    }
  }

  getPath(): string {
    return this.journalFile;
  }
}
