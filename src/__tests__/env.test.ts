import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, describe, expect, it } from 'vitest';
import { loadEnv, parseEnvLine } from '../utils/env';

describe('parseEnvLine', () => {
  it('splits on the first equals sign and drops quotes', () => {
    expect(parseEnvLine('USER_AGENT="LinkInspector/1.0 (test)"')).toEqual(['USER_AGENT', 'LinkInspector/1.0 (test)']);
    expect(parseEnvLine("export PORT='5000'")).toEqual(['PORT', '5000']);
    expect(parseEnvLine('QUERY=a=b')).toEqual(['QUERY', 'a=b']);
  });

  it('skips comments, blanks and lines without a key', () => {
    expect(parseEnvLine('# PORT=1')).toBeNull();
    expect(parseEnvLine('   ')).toBeNull();
    expect(parseEnvLine('=value')).toBeNull();
    expect(parseEnvLine('NO_SEPARATOR')).toBeNull();
  });
});

describe('loadEnv', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'link-inspector-env-'));
  const envFile = path.join(dir, '.env');

  afterAll(() => {
    delete process.env.LINK_INSPECTOR_FROM_FILE;
    delete process.env.LINK_INSPECTOR_PRESET;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads unset variables from the file once and keeps existing ones', () => {
    fs.writeFileSync(
      envFile,
      ['# comment', 'LINK_INSPECTOR_FROM_FILE=a=b', 'LINK_INSPECTOR_PRESET=from-file', ''].join('\r\n'),
    );
    process.env.LINK_INSPECTOR_PRESET = 'from-shell';

    expect(loadEnv(envFile)).toEqual(['LINK_INSPECTOR_FROM_FILE']);
    expect(process.env.LINK_INSPECTOR_FROM_FILE).toBe('a=b');
    expect(process.env.LINK_INSPECTOR_PRESET).toBe('from-shell');

    delete process.env.LINK_INSPECTOR_FROM_FILE;
    expect(loadEnv(envFile)).toEqual([]);
    expect(process.env.LINK_INSPECTOR_FROM_FILE).toBeUndefined();
  });

  it('does nothing when the file is missing', () => {
    expect(loadEnv(path.join(dir, 'absent.env'))).toEqual([]);
  });
});
