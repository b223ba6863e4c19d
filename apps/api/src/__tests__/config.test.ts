/**
 * Tests for environment configuration loading
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      env: 'development',
      host: '0.0.0.0',
      port: 3000,
      logLevel: 'info',
      maxRecords: 10000,
      webAppUrl: 'http://localhost:5173',
      version: '0.0.0',
    });
  });

  it('should read and coerce provided variables', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      HOST: '127.0.0.1',
      PORT: '8080',
      LOG_LEVEL: 'debug',
      LEDGER_MAX_RECORDS: '50',
      WEB_APP_URL: 'https://ledger.example.com',
      npm_package_version: '1.2.3',
    });

    expect(config).toEqual({
      env: 'production',
      host: '127.0.0.1',
      port: 8080,
      logLevel: 'debug',
      maxRecords: 50,
      webAppUrl: 'https://ledger.example.com',
      version: '1.2.3',
    });
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ PORT: '', LEDGER_MAX_RECORDS: '' })).toMatchObject({
      port: 3000,
      maxRecords: 10000,
    });
  });

  it('should reject invalid values naming the variable', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(/^Invalid environment configuration: PORT: /);
  });

  it('should reject a non-positive record limit', () => {
    expect(() => loadConfig({ LEDGER_MAX_RECORDS: '0' })).toThrow(
      /Invalid environment configuration: LEDGER_MAX_RECORDS: /
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
