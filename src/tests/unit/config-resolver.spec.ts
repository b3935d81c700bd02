import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EnvFileError, parseEnvFile, resolveEnvironment } from '../../config-resolver.js';

describe('parseEnvFile', () => {
  it('reads assignments and skips comments and junk', () => {
    const content = [
      '# runner settings',
      'A2A_BASE_URL=http://agent.test',
      'export DATASET_NAME = demo',
      'A2A_AUTH_TOKEN="test-secret"',
      "LOG_PROMPT='1'",
      'not an assignment',
      '=orphan',
      '',
    ].join('\r\n');
    expect(parseEnvFile(content)).toEqual({
      A2A_BASE_URL: 'http://agent.test',
      DATASET_NAME: 'demo',
      A2A_AUTH_TOKEN: 'test-secret',
      LOG_PROMPT: '1',
    });
  });

  it('keeps everything after the first equals sign', () => {
    expect(parseEnvFile('OTEL_RESOURCE_ATTRIBUTES=a=1,b=2')).toEqual({ OTEL_RESOURCE_ATTRIBUTES: 'a=1,b=2' });
  });
});

describe('resolveEnvironment', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'a2a-runner-env-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('layers the default .env under the real environment', () => {
    fs.writeFileSync(path.join(dir, '.env'), 'DATASET_NAME=from-file\nMAX_TASKS=5\n');
    const env = resolveEnvironment({ env: { DATASET_NAME: 'from-env', MAX_TASKS: undefined }, cwd: dir });
    expect(env).toEqual({ DATASET_NAME: 'from-env', MAX_TASKS: '5' });
  });

  it('works without a default .env', () => {
    expect(resolveEnvironment({ env: { A2A_BASE_URL: 'http://agent.test' }, cwd: dir })).toEqual({ A2A_BASE_URL: 'http://agent.test' });
  });

  it('reads an explicitly named file relative to cwd', () => {
    fs.writeFileSync(path.join(dir, 'bench.env'), 'A2A_TIMEOUT_SECONDS=30\n');
    expect(resolveEnvironment({ env: {}, envFile: 'bench.env', cwd: dir })).toEqual({ A2A_TIMEOUT_SECONDS: '30' });
  });

  it('fails when an explicitly named file is missing', () => {
    expect(() => resolveEnvironment({ env: {}, envFile: 'missing.env', cwd: dir })).toThrow(EnvFileError);
    expect(() => resolveEnvironment({ env: {}, envFile: 'missing.env', cwd: dir }))
      .toThrow(`failed to read env file ${path.join(dir, 'missing.env')}: file not found`);
  });
});
