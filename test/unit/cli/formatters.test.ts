import { describe, it, expect, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { parseOutputFormat, readInput, readStdin, toHuman, toJson } from '@/cli/formatters.js';

describe('parseOutputFormat', () => {
  it('should default to json when --output not specified', () => {
    expect(parseOutputFormat([])).toBe('json');
    expect(parseOutputFormat(['--key', 'kms://k'])).toBe('json');
  });

  it.each(['json', 'human', 'raw'] as const)('should parse %s format', (format) => {
    expect(parseOutputFormat(['--output', format])).toBe(format);
  });

  it('should throw for invalid format', () => {
    expect(() => parseOutputFormat(['--output', 'xml'])).toThrow('Invalid output format: xml');
  });

  it('should throw when --output has no value', () => {
    expect(() => parseOutputFormat(['--output'])).toThrow('Missing value for --output');
  });

  it('should throw when --output is followed by another flag', () => {
    expect(() => parseOutputFormat(['--output', '--key'])).toThrow('Missing value for --output');
  });
});

describe('toJson', () => {
  it('should stringify with pretty printing by default', () => {
    expect(toJson({ a: 1 })).toBe('{\n  "a": 1\n}');
  });

  it('should stringify without pretty printing when requested', () => {
    expect(toJson({ a: 1 }, false)).toBe('{"a":1}');
  });
});

describe('toHuman', () => {
  it('should format key-value pairs as an aligned table', () => {
    expect(toHuman({ keyId: 'abc', family: 'rsa' }, 'Key')).toBe(
      '--- Key ---\nkeyId   abc\nfamily  rsa',
    );
  });

  it('should skip undefined values', () => {
    expect(toHuman({ family: 'ecdsa', keySize: undefined })).toBe('family   ecdsa');
  });

  it('should inline objects as compact JSON', () => {
    expect(toHuman({ algs: ['ECDSA_SHA_256'] })).toBe('algs  ["ECDSA_SHA_256"]');
  });

  it('should handle empty data', () => {
    expect(toHuman({})).toBe('');
  });
});

describe('readStdin', () => {
  it('should concatenate string and buffer chunks', async () => {
    const bytes = await readStdin(Readable.from([Buffer.from('ro'), 'ot']));
    expect(Buffer.from(bytes).toString('utf8')).toBe('root');
  });
});

describe('readInput', () => {
  const dir = mkdtempSync(join(tmpdir(), 'kms-key-source-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read a file as bytes', async () => {
    const path = join(dir, 'root.json');
    writeFileSync(path, Buffer.from([0x7b, 0x00, 0xff, 0x7d]));

    expect(await readInput(path)).toEqual(new Uint8Array([0x7b, 0x00, 0xff, 0x7d]));
  });
});
