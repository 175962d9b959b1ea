import { logger } from '../utils/logger';
import { parseRecordId, parseSearchPage, SearchPage } from './recordParser';
import { CommunitySearchOptions } from './types';
import { ZenodoApi } from './ZenodoApi';

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class CommunityLister {
  constructor(private api: ZenodoApi) {}

  /**
   * Walks the community search page by page and yields record ids lazily.
   * Any failure while listing is rethrown; the run cannot continue without the listing.
   */
  async *listRecordIds(options: CommunitySearchOptions): AsyncGenerator<number, void, unknown> {
    const { pageSize, maxRecords, pageDelay = 0 } = options;

    let page = 1;
    let listed = 0;
    let seen = 0;

    while (true) {
      const { ids, total } = await this.fetchPage(options, page);

      if (ids.length === 0) {
        logger.debug(`No results on page ${page}`);
        return;
      }

      seen += ids.length;
      logger.info(`Fetched page ${page}, total records so far: ${seen}`);

      for (const rawId of ids) {
        const id = parseRecordId(rawId);
        if (id === null) {
          logger.warn(`Skipping search hit with invalid id: ${String(rawId)}`);
          continue;
        }

        yield id;
        listed++;

        if (maxRecords !== undefined && listed >= maxRecords) {
          logger.debug(`Record limit of ${maxRecords} reached`);
          return;
        }
      }

      if (ids.length < pageSize || (total !== null && seen >= total)) {
        return;
      }

      page++;
      if (pageDelay > 0) {
        await sleep(pageDelay);
      }
    }
  }

  private async fetchPage(options: CommunitySearchOptions, page: number): Promise<SearchPage> {
    try {
      const payload = await this.api.getJson('/records', {
        communities: options.communityId,
        page,
        size: options.pageSize,
      });
      return parseSearchPage(payload);
    } catch (error) {
      logger.error(`Failed to fetch page ${page} of community ${options.communityId}:`, error);
      throw error;
    }
  }
}
