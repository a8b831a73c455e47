import { StateConfig } from '../config/bootstrap-config';
import { ConfigError } from '../errors/config-error';
import { FileSystemStateStore } from './file-system-state-store';
import { InMemoryStateStore } from './in-memory-state-store';
import { SqliteStateStore } from './sqlite-state-store';
import { StateStore } from './state-store';

export interface CreateStateStoreOptions {
  clock?: () => Date;
}

export function createStateStore(
  config: StateConfig = { backend: 'memory' },
  options: CreateStateStoreOptions = {}
): StateStore {
  switch (config.backend) {
    case 'memory':
      return new InMemoryStateStore();
    case 'filesystem':
      return new FileSystemStateStore({ rootDir: requirePath(config), clock: options.clock });
    case 'sqlite':
      return new SqliteStateStore({ databasePath: requirePath(config), clock: options.clock });
  }
}

function requirePath(config: StateConfig): string {
  if (!config.path) {
    throw new ConfigError(`state.path is required for the ${config.backend} backend`, {
      code: 'CONFIG_MISSING',
      source: 'state',
      issues: ['path'],
    });
  }
  return config.path;
}
