import { describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { exitCodeFor, parseOutputFormat, writeOutput } from '../../../src/cli/output.js';
import {
  ConfigError,
  DataSourceError,
  FileIOError,
  InputReadError,
  InvalidInputError,
} from '../../../src/utils/errors.js';

describe('CLI output helpers', () => {
  it('should map error codes to exit codes', () => {
    expect(exitCodeFor(new ConfigError('x'))).toBe(2);
    expect(exitCodeFor(new DataSourceError('x'))).toBe(3);
    expect(exitCodeFor(new FileIOError('x'))).toBe(4);
    expect(exitCodeFor(new InputReadError('x'))).toBe(4);
    expect(exitCodeFor(new InvalidInputError('x'))).toBe(1);
  });

  it('should default to json and reject formats a command does not offer', () => {
    expect(parseOutputFormat(undefined, ['json', 'text'])).toBe('json');
    expect(parseOutputFormat('text', ['json', 'text'])).toBe('text');
    expect(() => parseOutputFormat('ndjson', ['json', 'text'])).toThrow(
      'Unsupported output format "ndjson". Use one of: json, text',
    );
  });

  it('should create missing directories for a report file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'reid-risk-'));
    try {
      const target = join(dir, 'nested', 'report.json');
      await writeOutput('{"ok":true}', target);
      await expect(readFile(target, 'utf8')).resolves.toBe('{"ok":true}');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
