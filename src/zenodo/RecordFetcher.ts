import { CommunityRecord } from '../types';
import { HttpError } from '../errors';
import { logger } from '../utils/logger';
import { parseRecord } from './recordParser';
import { ZenodoApi } from './ZenodoApi';

export class RecordFetcher {
  constructor(private api: ZenodoApi) {}

  /**
   * Fetches full metadata for one record. Returns null when the record is missing,
   * inaccessible or malformed so the caller can skip it.
   */
  async fetchRecord(recordId: number): Promise<CommunityRecord | null> {
    try {
      const payload = await this.api.getJson(`/records/${recordId}`);
      return parseRecord(payload);
    } catch (error) {
      if (error instanceof HttpError && error.status === 404) {
        logger.warn(`Record not found: ${recordId}`);
      } else {
        logger.error(`Failed to fetch details for record ${recordId}:`, error);
      }
      return null;
    }
  }
}
