/**
 * Tests for the structured logging API.
 */

import { describe, expect, it } from 'vitest';
import {
  createLogger,
  createRootLogger,
  loggerOptionsFromEnv,
} from '../../../src/logging/index.js';

function captureLogger(level = 'trace') {
  const lines: string[] = [];
  const destination = {
    write(message: string): void {
      lines.push(message);
    },
  };
  const base = createRootLogger({ name: 'test', level }, destination);
  const records = (): Array<Record<string, unknown>> =>
    lines.map((line): Record<string, unknown> => JSON.parse(line));
  return { base, records };
}

describe('loggerOptionsFromEnv', () => {
  it('defaults to info without a pretty transport under test', () => {
    expect(loggerOptionsFromEnv({ NODE_ENV: 'test' })).toEqual({
      name: 'schema-wiring',
      level: 'info',
    });
  });

  it('reads the level case-insensitively', () => {
    const options = loggerOptionsFromEnv({ NODE_ENV: 'production', WIRING_LOG_LEVEL: ' DEBUG ' });

    expect(options.level).toBe('debug');
    expect(options.transport).toBeUndefined();
  });

  it('falls back to info for unknown levels', () => {
    expect(loggerOptionsFromEnv({ NODE_ENV: 'test', WIRING_LOG_LEVEL: 'verbose' }).level).toBe(
      'info'
    );
  });

  it('pretty-prints outside production and test', () => {
    expect(loggerOptionsFromEnv({}).transport).toEqual({
      target: 'pino-pretty',
      options: { colorize: true },
    });
  });
});

describe('createLogger', () => {
  it('merges preset fields into every record', () => {
    const { base, records } = captureLogger();
    const logger = createLogger({ component: 'type_wiring' }, base);

    logger.warn('Replacing field resolver', { type_name: 'Pet', field_name: 'name' });

    const [record] = records();
    expect(records()).toHaveLength(1);
    expect(record).toMatchObject({
      level: 40,
      name: 'test',
      component: 'type_wiring',
      type_name: 'Pet',
      field_name: 'name',
      msg: 'Replacing field resolver',
    });
  });

  it('writes each level with the pino level number', () => {
    const { base, records } = captureLogger();
    const logger = createLogger({ component: 'test' }, base);

    logger.error('e');
    logger.warn('w');
    logger.info('i');
    logger.debug('d');
    logger.trace('t');

    expect(records().map((record) => record.level)).toEqual([50, 40, 30, 20, 10]);
  });

  it('drops records below the configured level', () => {
    const { base, records } = captureLogger('warn');
    const logger = createLogger({ component: 'test' }, base);

    logger.info('hidden');
    logger.error('shown');

    expect(records().map((record) => record.msg)).toEqual(['shown']);
  });
});
