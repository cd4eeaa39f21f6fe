import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { verify } from 'node:crypto';
import { runSign } from '@/cli/commands/sign.js';
import { KmsSigner } from '@/kms-signer.js';
import { parseKeyReference } from '@/key-reference.js';
import type { CliContext } from '@/cli/context.js';
import { InMemoryKms } from '../../../helpers/in-memory-kms.js';
import { testKeyPair } from '../../../helpers/test-keys.js';

const CONTENT = Buffer.from('{"signed":{"_type":"timestamp","version":7}}');

describe('runSign CLI command', () => {
  const dir = mkdtempSync(join(tmpdir(), 'kms-key-source-sign-'));
  const inputPath = join(dir, 'timestamp.json');
  writeFileSync(inputPath, CONTENT);

  let stdoutWrite: MockInstance<typeof process.stdout.write>;
  let kms: InMemoryKms;
  let ctx: CliContext;

  beforeEach(() => {
    stdoutWrite = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    kms = new InMemoryKms();
    kms.createKey('alias/timestamp', 'ECC_NIST_P256');
    ctx = {
      signer: new KmsSigner(kms, { keyReference: parseKeyReference('kms://alias/timestamp') }),
    };
  });

  afterEach(() => {
    stdoutWrite.mockRestore();
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const output = () => String(stdoutWrite.mock.calls[0][0]);

  it('should output the signature as JSON', async () => {
    await runSign(ctx, ['--input', inputPath]);

    const result = JSON.parse(output());
    expect(result.keyId).toBe(await ctx.signer.keyId());
    expect(result.algorithm).toBe('ECDSA_SHA_256');
    expect(result.encoding).toBe('der');
    expect(
      verify('sha256', CONTENT, testKeyPair('p256').publicKey, Buffer.from(result.signature, 'base64')),
    ).toBe(true);
  });

  it('should output only base64 for raw format', async () => {
    await runSign(ctx, ['--input', inputPath, '--output', 'raw']);

    expect(output()).toMatch(/^[A-Za-z0-9+/]+={0,2}\n$/);
  });

  it('should output a table for human format', async () => {
    await runSign(ctx, ['--input', inputPath, '--output', 'human']);

    expect(output()).toMatch(/^--- Signature ---\nkeyId {6}[0-9a-f]{64}\n/);
  });

  it('should require --input', async () => {
    await expect(runSign(ctx, [])).rejects.toThrow(
      'Usage: kms-key-source sign --key <uri> --input <file|-> [--timeout-ms <ms>]',
    );
    expect(kms.calls).toEqual([]);
  });

  it.each(['0', '-5', '1.5', 'soon'])('should reject --timeout-ms %s', async (value) => {
    await expect(runSign(ctx, ['--input', inputPath, '--timeout-ms', value])).rejects.toThrow(
      '--timeout-ms must be a positive integer',
    );
  });

  it('should sign within a generous deadline', async () => {
    await runSign(ctx, ['--input', inputPath, '--timeout-ms', '10000']);
    expect(kms.callCount('Sign')).toBe(1);
  });
});
