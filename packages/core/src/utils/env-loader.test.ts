import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EnvLoader } from './env-loader';

describe('EnvLoader', () => {
  let projectPath: string;

  beforeEach(() => {
    projectPath = fs.mkdtempSync(path.join(os.tmpdir(), 'bgscreen-env-'));
    process.env.BGSCREEN_TEST_PRESET = 'from-shell';
  });

  afterEach(() => {
    fs.rmSync(projectPath, { recursive: true, force: true });
    delete process.env.BGSCREEN_TEST_PRESET;
    delete process.env.BGSCREEN_TEST_FROM_FILE;
    delete process.env.BGSCREEN_TEST_QUOTED;
  });

  it('fills unset variables and keeps existing ones', () => {
    fs.writeFileSync(
      path.join(projectPath, '.env'),
      '# comment\nBGSCREEN_TEST_FROM_FILE=loaded\nBGSCREEN_TEST_PRESET=from-file\nBGSCREEN_TEST_QUOTED="a b"\n'
    );

    EnvLoader.load(projectPath);

    expect(process.env.BGSCREEN_TEST_FROM_FILE).toBe('loaded');
    expect(process.env.BGSCREEN_TEST_PRESET).toBe('from-shell');
    expect(process.env.BGSCREEN_TEST_QUOTED).toBe('a b');
  });

  it('does nothing without a .env file', () => {
    EnvLoader.load(projectPath);

    expect(process.env.BGSCREEN_TEST_FROM_FILE).toBeUndefined();
  });
});
