import fs from 'fs-extra';
import path from 'path';
import { CommunityDownloader } from '../zenodo/CommunityDownloader';
import { FakeZenodo, makeRecords, md5 } from './helpers/fakeZenodo';
import { makeTestConfig, TestPaths } from './test-config';

async function listFiles(dir: string): Promise<string[]> {
  const found: string[] = [];
  const walk = async (current: string) => {
    for (const entry of await fs.readdir(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else {
        found.push(path.relative(dir, full));
      }
    }
  };
  await walk(dir);
  return found.sort();
}

describe('CommunityDownloader', () => {
  const outputDir = TestPaths.integration.communityDownloader;
  const journalPath = path.join(outputDir, 'iodp_metadata.json');

  beforeEach(async () => {
    await fs.remove(outputDir);
  });

  afterAll(async () => {
    await fs.remove(outputDir);
  });

  it('should download every file of every record and journal each record', async () => {
    const fake = new FakeZenodo(makeRecords(3, 2));

    const result = await new CommunityDownloader(makeTestConfig(outputDir), fake.fetch).run();

    expect(result).toMatchObject({
      success: true,
      recordsProcessed: 3,
      recordsFailed: 0,
      filesDownloaded: 6,
      filesSkipped: 0,
      filesFailed: 0,
      errors: [],
    });
    const file = path.join(outputDir, 'record_2', 'Expedition 2 Core data', 'file_1.csv');
    expect(await fs.readFile(file, 'utf8')).toBe('record 2 file 1\n');

    const journal = await fs.readJson(journalPath);
    expect(Object.keys(journal)).toEqual(['1', '2', '3']);
    expect(journal['3']).toEqual({
      id: 3,
      title: 'Expedition 3: Core data',
      description: 'Description of Expedition 3: Core data',
      creators: [{ name: 'Doe, Jane', affiliation: 'Test Institute' }],
      publication_date: '2024-05-01',
      doi: '10.5281/zenodo.3',
      files: fake.toRecord(3).files.map(file => ({
        key: file.key,
        size: file.size,
        checksum: file.checksum,
      })),
    });
  });

  it('should not request files that are already complete on a re-run', async () => {
    const fake = new FakeZenodo(makeRecords(3, 2));
    await new CommunityDownloader(makeTestConfig(outputDir), fake.fetch).run();
    const firstRunFiles = await listFiles(outputDir);

    const rerun = new FakeZenodo(makeRecords(3, 2));
    const result = await new CommunityDownloader(makeTestConfig(outputDir), rerun.fetch).run();

    expect(rerun.fileRequests()).toEqual([]);
    expect(result.filesSkipped).toBe(6);
    expect(result.filesDownloaded).toBe(0);
    expect(await listFiles(outputDir)).toEqual(firstRunFiles);
  });

  it('should still persist the other files of a record when one download fails', async () => {
    const records = makeRecords(1, 3);
    records[0].files[1].fail = true;
    const fake = new FakeZenodo(records);

    const result = await new CommunityDownloader(makeTestConfig(outputDir), fake.fetch).run();

    expect(fake.fileRequests()).toHaveLength(3);
    expect(result).toMatchObject({
      success: false,
      recordsProcessed: 1,
      filesDownloaded: 2,
      filesFailed: 1,
    });
    expect(await listFiles(outputDir)).toEqual([
      'iodp_metadata.json',
      path.join('record_1', 'Expedition 1 Core data', 'file_1.csv'),
      path.join('record_1', 'Expedition 1 Core data', 'file_3.csv'),
    ]);
    expect(Object.keys(await fs.readJson(journalPath))).toEqual(['1']);
  });

  it('should download the rest of a record when one file entry has no size', async () => {
    const records = makeRecords(1, 2);
    records[0].files[1].omitSize = true;
    const fake = new FakeZenodo(records);

    const result = await new CommunityDownloader(makeTestConfig(outputDir), fake.fetch).run();

    expect(fake.fileRequests()).toEqual([FakeZenodo.fileUrl(1, 'file_1.csv')]);
    expect(result).toMatchObject({
      success: false,
      recordsProcessed: 1,
      recordsFailed: 0,
      filesDownloaded: 1,
      filesFailed: 1,
    });
    expect(await listFiles(outputDir)).toEqual([
      'iodp_metadata.json',
      path.join('record_1', 'Expedition 1 Core data', 'file_1.csv'),
    ]);
    const journal = await fs.readJson(journalPath);
    expect(journal['1'].files).toEqual([
      { key: 'file_1.csv', size: 16, checksum: `md5:${md5('record 1 file 1\n')}` },
      { key: 'file_2.csv', size: null, checksum: `md5:${md5('record 1 file 2\n')}` },
    ]);
  });

  it('should skip a record whose details cannot be fetched and carry on', async () => {
    const records = makeRecords(3, 1);
    records[1].broken = true;
    const fake = new FakeZenodo(records);

    const result = await new CommunityDownloader(makeTestConfig(outputDir), fake.fetch).run();

    expect(result.recordsProcessed).toBe(2);
    expect(result.recordsFailed).toBe(1);
    expect(result.errors).toEqual(['Record 2 could not be fetched']);
    expect(Object.keys(await fs.readJson(journalPath))).toEqual(['1', '3']);
    expect(await fs.pathExists(path.join(outputDir, 'record_2'))).toBe(false);
  });

  it('should limit debug runs to 2 records of 2 files', async () => {
    const fake = new FakeZenodo(makeRecords(5, 3));

    const result = await new CommunityDownloader(
      makeTestConfig(outputDir, { debug: true }),
      fake.fetch
    ).run();

    expect(result.recordsProcessed).toBe(2);
    expect(result.filesDownloaded).toBe(4);
    expect(fake.fileRequests()).toHaveLength(4);
    expect(Object.keys(await fs.readJson(journalPath))).toEqual(['1', '2']);
  });

  it('should end with the same files after an interrupted run is resumed', async () => {
    const records = makeRecords(4, 2);

    const uninterruptedDir = path.join(outputDir, 'uninterrupted');
    await new CommunityDownloader(
      makeTestConfig(uninterruptedDir),
      new FakeZenodo(records).fetch
    ).run();

    // a debug run stands in for a run stopped after the second record
    const resumedDir = path.join(outputDir, 'resumed');
    await new CommunityDownloader(
      makeTestConfig(resumedDir, { debug: true }),
      new FakeZenodo(records).fetch
    ).run();
    const resumed = new FakeZenodo(records);
    await new CommunityDownloader(makeTestConfig(resumedDir), resumed.fetch).run();

    expect(await listFiles(resumedDir)).toEqual(await listFiles(uninterruptedDir));
    expect(resumed.fileRequests()).toHaveLength(4);
    expect(await fs.readJson(path.join(resumedDir, 'iodp_metadata.json'))).toEqual(
      await fs.readJson(path.join(uninterruptedDir, 'iodp_metadata.json'))
    );
  });

  it('should write an empty journal when the community has no records', async () => {
    const fake = new FakeZenodo([]);

    const result = await new CommunityDownloader(makeTestConfig(outputDir), fake.fetch).run();

    expect(result.recordsProcessed).toBe(0);
    expect(await fs.readJson(journalPath)).toEqual({});
  });

  it('should abort the run when listing fails', async () => {
    const fake = new FakeZenodo(makeRecords(2, 1));
    fake.searchStatus = 500;

    await expect(
      new CommunityDownloader(makeTestConfig(outputDir), fake.fetch).run()
    ).rejects.toThrow('HTTP 500: Service Unavailable');
    expect(fake.fileRequests()).toEqual([]);
  });
});
