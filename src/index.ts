/**
 * Industry classification catalog - public API
 */

export * from './modules/classification/index.js';
export * from './modules/description-lookup/index.js';

export {
  buildCatalog,
  type Catalog,
  type CatalogLoadError,
  type BuildCatalogDeps,
} from './app/build-catalog.js';

export { parseEnv, createConfig, type AppConfig, type SourcesConfig } from './infra/config/index.js';
export { createLogger, type Logger, type LogLevel } from './infra/logger/index.js';
export type { AppError, SourceError } from './common/types/errors.js';
