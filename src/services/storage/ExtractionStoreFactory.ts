import type { Config } from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ExtractionStore } from './ExtractionStore.interface.js';
import { SQLiteExtractionStore } from './SQLiteExtractionStore.js';
import { Neo4jExtractionStore } from './Neo4jExtractionStore.js';

export async function createExtractionStore(settings: Config['storage']): Promise<ExtractionStore> {
  logger.info({ backend: settings.backend }, 'Creating extraction store');

  switch (settings.backend) {
    case 'sqlite':
      return new SQLiteExtractionStore(settings.sqlitePath);
    case 'neo4j': {
      if (!settings.neo4j) {
        throw new ConfigurationError('NEO4J_URI is required when STORAGE_BACKEND=neo4j');
      }
      const store = new Neo4jExtractionStore(settings.neo4j);
      await store.connect();
      return store;
    }
  }
}
