import { describe, expect, it } from 'vitest';

import { createConfig, parseEnv } from '@/infra/config/index.js';
import { createLogger } from '@/infra/logger/index.js';

describe('createLogger', () => {
  it('defaults to info', () => {
    expect(createLogger().level).toBe('info');
  });

  it('takes its settings from the app config', () => {
    const config = createConfig(parseEnv({ NODE_ENV: 'production', LOG_LEVEL: 'debug' }));

    expect(config.logger.pretty).toBe(false);
    expect(createLogger(config.logger).level).toBe('debug');
  });

  it('overrides only the given fields', () => {
    expect(createLogger({ level: 'silent' }).level).toBe('silent');
  });
});
