import { loadConfig } from '../cli/config';
import { ConfigError } from '../cli/errors';

describe('loadConfig', () => {
  it('applies defaults when only the bucket is set', () => {
    expect(loadConfig({ INVOICE_BUCKET_NAME: 'test-bucket' })).toEqual({
      bucketName: 'test-bucket',
      region: undefined,
      pollIntervalMs: 5000,
      concurrency: 1,
    });
  });

  it('reads every setting from the environment', () => {
    expect(loadConfig({
      INVOICE_BUCKET_NAME: ' test-bucket ',
      AWS_REGION: 'eu-west-1',
      TEXTRACT_POLL_INTERVAL_MS: '250',
      INVOICE_CONCURRENCY: '4',
    })).toEqual({
      bucketName: 'test-bucket',
      region: 'eu-west-1',
      pollIntervalMs: 250,
      concurrency: 4,
    });
  });

  it('treats a blank region as unset', () => {
    expect(loadConfig({ INVOICE_BUCKET_NAME: 'test-bucket', AWS_REGION: '  ' }).region).toBeUndefined();
  });

  it('falls back to the defaults for blank numeric values', () => {
    const config = loadConfig({
      INVOICE_BUCKET_NAME: 'test-bucket',
      TEXTRACT_POLL_INTERVAL_MS: '',
      INVOICE_CONCURRENCY: '  ',
    });

    expect(config.pollIntervalMs).toBe(5000);
    expect(config.concurrency).toBe(1);
  });

  it('accepts pino log levels in any case', () => {
    expect(loadConfig({ INVOICE_BUCKET_NAME: 'test-bucket', LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(loadConfig({ INVOICE_BUCKET_NAME: 'test-bucket', LOG_LEVEL: '' }).logLevel).toBeUndefined();
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ INVOICE_BUCKET_NAME: 'test-bucket', LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    expect(() => loadConfig({ INVOICE_BUCKET_NAME: 'test-bucket', LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });

  it('rejects a missing bucket name', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow('INVOICE_BUCKET_NAME: INVOICE_BUCKET_NAME no está configurada.');
  });

  it('rejects a non positive concurrency', () => {
    expect(() => loadConfig({ INVOICE_BUCKET_NAME: 'test-bucket', INVOICE_CONCURRENCY: '0' }))
      .toThrow(/INVOICE_CONCURRENCY/);
  });
});

describe('logger', () => {
  const previous = process.env.LOG_LEVEL;

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previous;
    }
  });

  it('loads even when LOG_LEVEL is not a pino level', () => {
    process.env.LOG_LEVEL = 'verbose';

    expect(() => jest.isolateModules(() => {
      require('../cli/logger');
    })).not.toThrow();
  });
});
