import mongoose from 'mongoose';

import { createServiceLogger } from '../observability/logger';

import { config } from './index';

const log = createServiceLogger('database');

let isConnected = false;

/**
 * The mongo ledger store commits each unit of work in a multi-document
 * transaction, which a standalone server rejects.
 */
const assertReplicaSet = async (): Promise<void> => {
  const hello = await mongoose.connection.getClient().db().admin().command({ hello: 1 });
  if (typeof hello.setName !== 'string' || hello.setName === '') {
    throw new Error('MongoDB must run as a replica set for ledger transactions');
  }
  log.debug({ replicaSet: hello.setName }, 'Replica set detected');
};

export const connectDatabase = async (): Promise<void> => {
  if (isConnected) {
    log.debug('Database already connected');
    return;
  }

  try {
    const conn = await mongoose.connect(config.mongodb.uri, {
      maxPoolSize: config.mongodb.maxPoolSize,
      minPoolSize: config.mongodb.minPoolSize,
      maxIdleTimeMS: config.mongodb.maxIdleTimeMS,
      serverSelectionTimeoutMS: config.mongodb.serverSelectionTimeoutMS,
    });
    await assertReplicaSet();
    isConnected = true;
    log.info({ host: conn.connection.host }, 'MongoDB connected');
  } catch (error) {
    log.error({ err: error }, 'MongoDB connection error');
    await mongoose.disconnect();
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  if (!isConnected) {
    return;
  }

  try {
    await mongoose.disconnect();
    isConnected = false;
    log.info('MongoDB disconnected');
  } catch (error) {
    log.error({ err: error }, 'MongoDB disconnection error');
    throw error;
  }
};

mongoose.connection.on('error', (err) => {
  log.error({ err }, 'MongoDB connection error');
  isConnected = false;
});

mongoose.connection.on('disconnected', () => {
  log.warn('MongoDB disconnected');
  isConnected = false;
});
