import { RecordFetcher } from '../zenodo/RecordFetcher';
import { ZenodoApi } from '../zenodo/ZenodoApi';
import { FetchLike } from '../zenodo/types';
import { FAKE_BASE_URL, FakeZenodo, jsonResponse } from './helpers/fakeZenodo';

describe('RecordFetcher', () => {
  const fake = new FakeZenodo([
    {
      id: 101,
      title: 'Expedition 395: Reykjanes Mantle Convection',
      files: [
        { key: 'logs.csv', content: 'depth,value\n1,2\n' },
        { key: 'README.md', content: '# Logs\n' },
      ],
    },
    { id: 102, title: 'Withdrawn', files: [], missing: true },
    { id: 103, title: 'Broken', files: [], broken: true },
  ]);

  function makeFetcher(fetchImpl: FetchLike): RecordFetcher {
    return new RecordFetcher(new ZenodoApi(FAKE_BASE_URL, 'test-secret', fetchImpl));
  }

  it('should fetch full metadata with the file manifest', async () => {
    const record = await makeFetcher(fake.fetch).fetchRecord(101);

    expect(record).toEqual(fake.toRecord(101));
    expect(record?.files.map(file => file.key)).toEqual(['logs.csv', 'README.md']);
  });

  it('should request the record detail endpoint with the bearer token', async () => {
    const requestsBefore = fake.requests.length;

    await makeFetcher(fake.fetch).fetchRecord(101);

    expect(fake.requests.slice(requestsBefore)).toEqual([
      { url: `${FAKE_BASE_URL}/records/101`, authorization: 'Bearer test-secret' },
    ]);
  });

  it('should return null for a missing record', async () => {
    expect(await makeFetcher(fake.fetch).fetchRecord(102)).toBeNull();
  });

  it('should return null when the service fails', async () => {
    expect(await makeFetcher(fake.fetch).fetchRecord(103)).toBeNull();
  });

  it('should return null for a network error', async () => {
    const fetchImpl: FetchLike = async () => {
      throw new Error('socket hang up');
    };

    expect(await makeFetcher(fetchImpl).fetchRecord(101)).toBeNull();
  });

  it('should return null for an unusable payload', async () => {
    const fetchImpl: FetchLike = async () =>
      jsonResponse({ id: 101, metadata: {}, files: [{ key: 'a.csv', links: {} }] });

    expect(await makeFetcher(fetchImpl).fetchRecord(101)).toBeNull();
  });
});
