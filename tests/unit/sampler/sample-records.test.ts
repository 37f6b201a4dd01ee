import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MongoClient, ObjectId } from 'mongodb';
import { createConnector, MongoConnector } from '../../../src/lib/sampler/connector.js';
import { RandomSamplingStrategy, sampleRecords } from '../../../src/lib/sampler/index.js';
import type { SamplerOptions } from '../../../src/lib/sampler/types.js';
import { DataSourceError } from '../../../src/utils/errors.js';

vi.mock('../../../src/lib/sampler/connector.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/lib/sampler/connector.js')>();
  return { ...actual, createConnector: vi.fn() };
});

vi.mock('../../../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/utils/logger.js')>();
  return {
    ...actual,
    logger: { info: vi.fn(), error: vi.fn(), debug: vi.fn(), warn: vi.fn() },
  };
});

const OPTIONS: SamplerOptions = {
  uri: 'mongodb://localhost:27017',
  database: 'clinic',
  collection: 'visits',
  sampleSize: 2,
  strategy: 'random',
};

describe('sampleRecords()', () => {
  let connector: MongoConnector;

  beforeEach(() => {
    connector = new MongoConnector();
    vi.mocked(createConnector).mockResolvedValue(connector);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should normalize sampled documents and close the connection', async () => {
    // Never connected: the strategy below answers instead of the server
    const collection = new MongoClient(OPTIONS.uri).db('clinic').collection('visits');
    vi.spyOn(connector, 'getCollection').mockReturnValue(collection);
    const sample = vi
      .spyOn(RandomSamplingStrategy.prototype, 'sample')
      .mockResolvedValue([{ _id: new ObjectId('65a1b2c3d4e5f6a7b8c9d0e1'), Age: 28, Diagnosis: 'Asthma' }]);
    const close = vi.spyOn(connector, 'close');

    const result = await sampleRecords({ ...OPTIONS, attributes: ['Age', 'Diagnosis'] });

    expect(result.rows).toEqual([{ Age: 28, Diagnosis: 'Asthma' }]);
    expect(result.metadata).toMatchObject({ totalSampled: 1, collectionName: 'visits' });
    expect(sample).toHaveBeenCalledWith(collection, 2, { Age: 1, Diagnosis: 1, _id: 0 });
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should wrap driver failures and still close the connection', async () => {
    vi.spyOn(connector, 'getCollection').mockImplementation(() => {
      throw new Error('server selection timed out');
    });
    const close = vi.spyOn(connector, 'close');

    const failure = sampleRecords(OPTIONS);

    await expect(failure).rejects.toThrow(DataSourceError);
    await expect(failure).rejects.toThrow(
      'Sampling from collection visits failed: server selection timed out',
    );
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should pass coded errors through unchanged', async () => {
    const original = new DataSourceError('Not connected to MongoDB. Call connect() first.');
    vi.spyOn(connector, 'getCollection').mockImplementation(() => {
      throw original;
    });
    const close = vi.spyOn(connector, 'close');

    await expect(sampleRecords(OPTIONS)).rejects.toBe(original);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should report a failed connection', async () => {
    vi.mocked(createConnector).mockRejectedValue(new Error('connection refused'));

    await expect(sampleRecords(OPTIONS)).rejects.toThrow(
      'Sampling from collection visits failed: connection refused',
    );
  });
});
