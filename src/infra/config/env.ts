/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import path from 'node:path';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { DEFAULT_LOGGER_NAME, type LoggerConfig } from '../logger/index.js';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Directory holding the catalog source files
  CATALOG_DATA_DIR: Type.String({ default: 'data/example', minLength: 1 }),
});

export type Env = Static<typeof EnvSchema>;

/**
 * File names of the catalog sources inside CATALOG_DATA_DIR.
 */
export const SOURCE_FILE_NAMES = {
  structure: 'structure.csv',
  activities: 'activities.csv',
  metadata: 'metadata.json',
  descriptions: 'descriptions.csv',
  rephrased: 'rephrased-descriptions.csv',
} as const;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    CATALOG_DATA_DIR: env['CATALOG_DATA_DIR'] ?? 'data/example',
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => {
  const dataDir = path.resolve(env.CATALOG_DATA_DIR);

  return {
    env: {
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
    },
    logger: {
      name: DEFAULT_LOGGER_NAME,
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV !== 'production',
    } satisfies LoggerConfig,
    sources: {
      dataDir,
      structurePath: path.join(dataDir, SOURCE_FILE_NAMES.structure),
      activitiesPath: path.join(dataDir, SOURCE_FILE_NAMES.activities),
      metadataPath: path.join(dataDir, SOURCE_FILE_NAMES.metadata),
      descriptionsPath: path.join(dataDir, SOURCE_FILE_NAMES.descriptions),
      rephrasedPath: path.join(dataDir, SOURCE_FILE_NAMES.rephrased),
    },
  };
};

export type AppConfig = ReturnType<typeof createConfig>;
export type SourcesConfig = AppConfig['sources'];
