export {
  EnvSchema,
  SOURCE_FILE_NAMES,
  parseEnv,
  createConfig,
  type Env,
  type AppConfig,
  type SourcesConfig,
} from './env.js';
