import { WardenConfig } from '../config/index.js';
import { StorageProvider } from './StorageProvider.js';
import { FileStorageProvider } from './FileStorageProvider.js';
import { RedisStorageProvider } from './RedisStorageProvider.js';
import { NodeRedisCommands } from './redisCommands.js';

/**
 * Create a storage provider based on configuration
 */
export function createStorageProvider(config: WardenConfig): StorageProvider {
  switch (config.storage.provider) {
    case 'file':
      if (!config.storage.fileStorage) {
        throw new Error('File storage configuration is required when provider is "file"');
      }
      return new FileStorageProvider(
        config.storage.fileStorage.dataDir,
        config.storage.fileStorage.lockTimeout
      );

    case 'redis':
      if (!config.storage.connectionString) {
        throw new Error('Redis connection string is required when using Redis storage provider');
      }
      return new RedisStorageProvider(
        new NodeRedisCommands(config.storage.connectionString, config.storage.redis?.database ?? 0),
        config.storage.redis?.keyPrefix ?? 'warden:'
      );
  }
}

export * from './StorageProvider.js';
export * from './FileStorageProvider.js';
export * from './RedisStorageProvider.js';
export * from './redisCommands.js';
export * from './redisScripts.js';
