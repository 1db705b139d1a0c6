/**
 * Database Configuration Unit Tests
 *
 * MongoDB connection management with mongoose mocked out.
 */

const mockCommand = jest.fn();
const mockMongooseConnect = jest.fn().mockResolvedValue({ connection: { host: 'localhost' } });
const mockMongooseDisconnect = jest.fn().mockResolvedValue(undefined);

jest.mock('mongoose', () => ({
  connect: mockMongooseConnect,
  disconnect: mockMongooseDisconnect,
  connection: {
    readyState: 1,
    on: jest.fn(),
    getClient: () => ({
      db: () => ({
        admin: () => ({ command: mockCommand }),
      }),
    }),
  },
}));

jest.mock('../../../src/observability/logger', () => ({
  createServiceLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

jest.mock('../../../src/config/index', () => ({
  config: {
    mongodb: {
      uri: 'mongodb://localhost:27017/test?replicaSet=rs0',
      maxPoolSize: 10,
      minPoolSize: 2,
      maxIdleTimeMS: 30000,
      serverSelectionTimeoutMS: 5000,
    },
  },
}));

type DatabaseModule = typeof import('../../../src/config/database');

const loadDatabase = async (): Promise<DatabaseModule> => {
  jest.resetModules();
  return import('../../../src/config/database');
};

describe('Database Configuration', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockCommand.mockResolvedValue({ setName: 'rs0' });
  });

  describe('connectDatabase', () => {
    it('should connect with the configured pool settings', async () => {
      const database = await loadDatabase();

      await database.connectDatabase();

      expect(mockMongooseConnect).toHaveBeenCalledWith('mongodb://localhost:27017/test?replicaSet=rs0', {
        maxPoolSize: 10,
        minPoolSize: 2,
        maxIdleTimeMS: 30000,
        serverSelectionTimeoutMS: 5000,
      });
      expect(mockCommand).toHaveBeenCalledWith({ hello: 1 });
    });

    it('should not reconnect if already connected', async () => {
      const database = await loadDatabase();
      await database.connectDatabase();
      mockMongooseConnect.mockClear();

      await database.connectDatabase();

      expect(mockMongooseConnect).not.toHaveBeenCalled();
    });

    it('should refuse a standalone server and drop the connection', async () => {
      mockCommand.mockResolvedValueOnce({ isWritablePrimary: true });
      const database = await loadDatabase();

      await expect(database.connectDatabase()).rejects.toThrow(
        'MongoDB must run as a replica set for ledger transactions'
      );
      expect(mockMongooseDisconnect).toHaveBeenCalledTimes(1);
    });

    it('should rethrow connection failures', async () => {
      mockMongooseConnect.mockRejectedValueOnce(new Error('Connection failed'));
      const database = await loadDatabase();

      await expect(database.connectDatabase()).rejects.toThrow('Connection failed');
    });
  });

  describe('disconnectDatabase', () => {
    it('should disconnect from MongoDB', async () => {
      const database = await loadDatabase();
      await database.connectDatabase();

      await database.disconnectDatabase();

      expect(mockMongooseDisconnect).toHaveBeenCalledTimes(1);
    });

    it('should do nothing if not connected', async () => {
      const database = await loadDatabase();

      await database.disconnectDatabase();

      expect(mockMongooseDisconnect).not.toHaveBeenCalled();
    });

    it('should rethrow disconnection failures', async () => {
      const database = await loadDatabase();
      await database.connectDatabase();
      mockMongooseDisconnect.mockRejectedValueOnce(new Error('Disconnect failed'));

      await expect(database.disconnectDatabase()).rejects.toThrow('Disconnect failed');
    });
  });
});
