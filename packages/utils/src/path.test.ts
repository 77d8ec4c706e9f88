import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { parseEnv } from './config.js';
import {
  customTmpDir,
  fileNameWithoutExtension,
  normJoin,
  resolveTmpDir,
  TMP_PATH,
} from './path.js';

describe('fileNameWithoutExtension', () => {
  it('strips directory and last extension', () => {
    expect(fileNameWithoutExtension('/foo/bar.baz')).toBe('bar');
    expect(fileNameWithoutExtension('/foo/bar')).toBe('bar');
    expect(fileNameWithoutExtension('archive.tar.gz')).toBe('archive.tar');
  });

  it('keeps dotfiles whole', () => {
    expect(fileNameWithoutExtension('/home/user/.bashrc')).toBe('.bashrc');
  });

  it('returns null for a missing path', () => {
    expect(fileNameWithoutExtension(null)).toBeNull();
    expect(fileNameWithoutExtension(undefined)).toBeNull();
  });
});

describe('normJoin', () => {
  it('joins and normalizes', () => {
    expect(normJoin('/foo', 'bar/../baz')).toBe('/foo/baz');
    expect(normJoin('/foo/', './bar/')).toBe('/foo/bar');
  });

  it('lets an absolute suffix replace the prefix', () => {
    expect(normJoin('/foo', '/etc/aligner')).toBe('/etc/aligner');
  });

  it('keeps the root separator', () => {
    expect(normJoin('/', '.')).toBe('/');
  });
});

describe('customTmpDir', () => {
  it('uses /tmp/ on linux and macOS', () => {
    expect(customTmpDir('linux')).toBe(TMP_PATH);
    expect(customTmpDir('darwin')).toBe('/tmp/');
  });

  it('defers to the OS elsewhere', () => {
    expect(customTmpDir('win32')).toBeUndefined();
  });
});

describe('resolveTmpDir', () => {
  it('prefers ALIGNER_TMP_DIR', () => {
    const env = parseEnv({ ALIGNER_TMP_DIR: '/var/tmp/aligner' });

    expect(resolveTmpDir(env.ALIGNER_TMP_DIR, 'win32')).toBe('/var/tmp/aligner');
  });

  it('falls back to the platform directory', () => {
    expect(resolveTmpDir(undefined, 'linux')).toBe('/tmp/');
  });

  it('falls back to the OS directory where the platform has none', () => {
    expect(resolveTmpDir(undefined, 'win32')).toBe(tmpdir());
  });
});
