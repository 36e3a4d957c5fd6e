import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import { DatabaseService } from './database.service';
import { AppConfig } from './env.schema';
import { NotFoundError, StorageError } from '../common/errors';

jest.mock('pg', () => ({ Pool: jest.fn(() => mockPool) }));

const mockPool = {
  query: jest.fn(),
  connect: jest.fn(),
  end: jest.fn(),
  on: jest.fn(),
};

describe('DatabaseService', () => {
  let service: DatabaseService;

  const mockClient = {
    query: jest.fn(),
    release: jest.fn(),
  };

  const configService = new ConfigService<AppConfig, true>({
    DATABASE_URL: 'postgres://localhost:5432/playlist_test',
    DB_POOL_MAX: 5,
  });

  beforeEach(() => {
    // clear, not reset: the Pool factory must keep returning mockPool
    jest.clearAllMocks();
    mockPool.connect.mockResolvedValue(mockClient);
    mockClient.query.mockResolvedValue({ rows: [] });

    service = new DatabaseService(configService);
  });

  it('should build the pool from configuration', () => {
    expect(Pool).toHaveBeenCalledWith({
      connectionString: 'postgres://localhost:5432/playlist_test',
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });
  });

  describe('query', () => {
    it('should return the result rows', async () => {
      mockPool.query.mockResolvedValueOnce({ rows: [{ id: 'song-1' }] });

      await expect(service.query('SELECT id FROM songs')).resolves.toEqual([{ id: 'song-1' }]);
    });

    it('should wrap driver failures in StorageError', async () => {
      const driverError = new Error('connection terminated');
      mockPool.query.mockRejectedValueOnce(driverError);

      const failure = service.query('SELECT 1');

      await expect(failure).rejects.toBeInstanceOf(StorageError);
      await expect(failure).rejects.toHaveProperty('cause', driverError);
    });
  });

  describe('queryOne', () => {
    it('should return null when there are no rows', async () => {
      mockPool.query.mockResolvedValueOnce({ rows: [] });

      await expect(service.queryOne('SELECT 1 WHERE false')).resolves.toBeNull();
    });
  });

  describe('transaction', () => {
    it('should wrap the work in BEGIN and COMMIT on one client', async () => {
      mockClient.query.mockResolvedValueOnce({ rows: [] });
      mockClient.query.mockResolvedValueOnce({ rows: [{ total: 3 }] });

      const result = await service.transaction((tx) => tx.queryOne('SELECT 3 AS total'));

      expect(result).toEqual({ total: 3 });
      expect(mockClient.query.mock.calls.map(([text]) => text)).toEqual([
        'BEGIN',
        'SELECT 3 AS total',
        'COMMIT',
      ]);
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should give null from queryOne inside a transaction when no row matches', async () => {
      const result = await service.transaction((tx) =>
        tx.queryOne<{ id: string }>('SELECT id FROM songs WHERE id = $1', ['missing']),
      );

      expect(result).toBeNull();
      expect(mockClient.query).toHaveBeenCalledWith('SELECT id FROM songs WHERE id = $1', [
        'missing',
      ]);
    });

    it('should open a read-only snapshot when asked', async () => {
      await service.transaction(async () => undefined, {
        isolation: 'REPEATABLE READ',
        readOnly: true,
      });

      expect(mockClient.query).toHaveBeenNthCalledWith(
        1,
        'BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY',
        undefined,
      );
    });

    it('should roll back and rethrow domain errors unchanged', async () => {
      const notFound = new NotFoundError('Song', 'missing');

      await expect(
        service.transaction(async () => {
          throw notFound;
        }),
      ).rejects.toBe(notFound);

      expect(mockClient.query).toHaveBeenLastCalledWith('ROLLBACK');
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should surface a failed statement as StorageError after rolling back', async () => {
      mockClient.query
        .mockResolvedValueOnce({ rows: [] })
        .mockRejectedValueOnce(new Error('deadlock detected'));

      await expect(
        service.transaction((tx) => tx.query('UPDATE songs SET current_rating = 1')),
      ).rejects.toBeInstanceOf(StorageError);

      expect(mockClient.query).toHaveBeenLastCalledWith('ROLLBACK');
    });

    it('should raise StorageError when no client can be acquired', async () => {
      mockPool.connect.mockRejectedValueOnce(new Error('timeout exceeded'));

      await expect(service.transaction(async () => undefined)).rejects.toBeInstanceOf(
        StorageError,
      );
    });
  });
});
