import { CommunityRecord, Creator, RecordFile } from '../types';
import { logger } from '../utils/logger';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Zenodo has served record ids both as numbers and as numeric strings.
 */
export function parseRecordId(value: unknown): number | null {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const id = Number(value.trim());
    return Number.isSafeInteger(id) && id > 0 ? id : null;
  }
  return null;
}

export interface SearchPage {
  ids: unknown[];
  total: number | null; // null when the service does not report a total
}

export function parseSearchPage(payload: unknown): SearchPage {
  if (!isObject(payload) || !isObject(payload.hits)) {
    throw new Error('Unexpected search response: missing "hits"');
  }

  const { hits, total } = payload.hits;
  if (!Array.isArray(hits)) {
    throw new Error('Unexpected search response: "hits.hits" is not a list');
  }

  let count: number | null = null;
  if (typeof total === 'number') {
    count = total;
  } else if (isObject(total) && typeof total.value === 'number') {
    count = total.value;
  }

  return {
    ids: hits.map(hit => (isObject(hit) ? hit.id : undefined)),
    total: count,
  };
}

function parseCreators(value: unknown): Creator[] {
  if (!Array.isArray(value)) return [];

  const creators: Creator[] = [];
  for (const entry of value) {
    if (!isObject(entry)) continue;
    const name = optionalString(entry.name);
    if (!name) continue;
    const creator: Creator = { name };
    const affiliation = optionalString(entry.affiliation);
    const orcid = optionalString(entry.orcid);
    if (affiliation) creator.affiliation = affiliation;
    if (orcid) creator.orcid = orcid;
    creators.push(creator);
  }
  return creators;
}

/**
 * Entries without a key cannot be placed on disk and are dropped. A missing link
 * or size is kept as null so the downloader fails that one file and the rest of
 * the record still goes through.
 */
function parseFile(value: unknown): RecordFile | null {
  const key = isObject(value) ? optionalString(value.key) : undefined;
  if (!isObject(value) || !key) {
    logger.warn('Skipping file entry without a key');
    return null;
  }

  const links: JsonObject = isObject(value.links) ? value.links : {};
  const url = optionalString(links.content) ?? optionalString(links.self) ?? null;

  const size =
    typeof value.size === 'number' && Number.isSafeInteger(value.size) && value.size >= 0
      ? value.size
      : null;

  const file: RecordFile = { key, url, size };
  const checksum = optionalString(value.checksum);
  if (checksum) file.checksum = checksum;
  return file;
}

function parseFiles(value: unknown): RecordFile[] {
  if (!Array.isArray(value)) return [];

  const files: RecordFile[] = [];
  for (const entry of value) {
    const file = parseFile(entry);
    if (file) files.push(file);
  }
  return files;
}

/**
 * Narrows a record detail payload into a CommunityRecord, throwing on shapes it cannot use.
 */
export function parseRecord(payload: unknown): CommunityRecord {
  if (!isObject(payload)) {
    throw new Error('Unexpected record response');
  }

  const id = parseRecordId(payload.id);
  if (id === null) {
    throw new Error(`Record has an invalid id: ${String(payload.id)}`);
  }

  const metadata: JsonObject = isObject(payload.metadata) ? payload.metadata : {};
  const files = parseFiles(payload.files);

  return {
    id,
    title: optionalString(metadata.title) ?? 'Unknown Title',
    description: optionalString(metadata.description),
    creators: parseCreators(metadata.creators),
    publicationDate: optionalString(metadata.publication_date),
    doi: optionalString(payload.doi),
    files,
  };
}

/**
 * Splits a Zenodo checksum ("md5:abc...") into algorithm and lowercase hex digest.
 */
export function parseChecksum(
  checksum: string | undefined
): { algorithm: string; digest: string } | null {
  if (!checksum) return null;
  const match = /^([a-z0-9-]+):([0-9a-f]+)$/i.exec(checksum.trim());
  if (!match) return null;
  return { algorithm: match[1].toLowerCase(), digest: match[2].toLowerCase() };
}
