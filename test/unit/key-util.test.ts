import { describe, it, expect } from 'vitest';
import { createHash, createPublicKey, generateKeyPairSync, sign, verify } from 'node:crypto';
import {
  decodePublicKey,
  deriveKeyId,
  derToP1363,
  derToPem,
  parseDerSignature,
} from '@/key-util.js';
import { KeyFormatError, UnsupportedKeyError } from '@/errors.js';
import { testKeyPair } from '../helpers/test-keys.js';

const REF = 'kms://alias/test-key';

const hex = (value: string) => new Uint8Array(Buffer.from(value.replace(/\s/g, ''), 'hex'));

// ============================================================================
// decodePublicKey
// ============================================================================

describe('decodePublicKey', () => {
  it.each([
    ['rsa-2048', 2048],
    ['rsa-3072', 3072],
  ] as const)('should classify %s', (kind, keySize) => {
    const { der } = testKeyPair(kind);
    const decoded = decodePublicKey(der, REF);

    expect(decoded.family).toBe('rsa');
    expect(decoded.keySize).toBe(keySize);
    expect(decoded.curve).toBeUndefined();
    expect(decoded.der).toEqual(der);
  });

  it.each([
    ['p256', 'P-256'],
    ['p384', 'P-384'],
    ['p521', 'P-521'],
    ['secp256k1', 'secp256k1'],
  ] as const)('should classify %s', (kind, curve) => {
    const decoded = decodePublicKey(testKeyPair(kind).der, REF);

    expect(decoded.family).toBe('ecdsa');
    expect(decoded.curve).toBe(curve);
    expect(decoded.keySize).toBeUndefined();
  });

  it('should reject bytes that are not SPKI DER', () => {
    const decode = () => decodePublicKey(new Uint8Array([1, 2, 3, 4]), REF);
    expect(decode).toThrow(KeyFormatError);
    expect(decode).toThrow('Public key for kms://alias/test-key is not a DER SubjectPublicKeyInfo');
  });

  it('should reject an empty key', () => {
    expect(() => decodePublicKey(new Uint8Array(0), REF)).toThrow(KeyFormatError);
  });

  it('should reject unsupported RSA sizes', () => {
    const decode = () => decodePublicKey(testKeyPair('rsa-1024').der, REF);
    expect(decode).toThrow(UnsupportedKeyError);
    expect(decode).toThrow('RSA key for kms://alias/test-key has unsupported modulus length 1024');
  });

  it('should reject unsupported curves', () => {
    const { publicKey } = generateKeyPairSync('ec', { namedCurve: 'secp224r1' });
    const der = new Uint8Array(publicKey.export({ format: 'der', type: 'spki' }));

    expect(() => decodePublicKey(der, REF)).toThrow(
      'EC key for kms://alias/test-key uses unsupported curve secp224r1',
    );
  });

  it('should reject key types with no signing algorithm', () => {
    expect(() => decodePublicKey(testKeyPair('ed25519').der, REF)).toThrow(
      'Key for kms://alias/test-key has unsupported type ed25519',
    );
  });
});

// ============================================================================
// deriveKeyId
// ============================================================================

describe('deriveKeyId', () => {
  it('should be the lowercase hex SHA-256 of the DER', () => {
    const { der } = testKeyPair('p256');
    const expected = createHash('sha256').update(der).digest('hex');

    expect(deriveKeyId(der)).toBe(expected);
    expect(deriveKeyId(der)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should be stable for equal bytes and differ across keys', () => {
    const der = testKeyPair('p384').der;
    expect(deriveKeyId(new Uint8Array(der))).toBe(deriveKeyId(der));
    expect(deriveKeyId(der)).not.toBe(deriveKeyId(testKeyPair('p256').der));
  });
});

// ============================================================================
// derToPem
// ============================================================================

describe('derToPem', () => {
  it('should wrap the key in a PUBLIC KEY envelope with 64-column lines', () => {
    const { der } = testKeyPair('rsa-2048');
    const pem = derToPem(der);
    const lines = pem.trimEnd().split('\n');

    expect(lines[0]).toBe('-----BEGIN PUBLIC KEY-----');
    expect(lines[lines.length - 1]).toBe('-----END PUBLIC KEY-----');
    expect(lines.slice(1, -1).every((line) => line.length <= 64)).toBe(true);
    expect(pem.endsWith('\n')).toBe(true);
  });

  it('should load back to the same key', () => {
    const { der } = testKeyPair('secp256k1');
    const reloaded = createPublicKey(derToPem(der)).export({ format: 'der', type: 'spki' });
    expect(new Uint8Array(reloaded)).toEqual(der);
  });
});

// ============================================================================
// parseDerSignature / derToP1363
// ============================================================================

describe('parseDerSignature', () => {
  it('should left-pad r and s to the field width', () => {
    const { r, s } = parseDerSignature(hex('3006 020101 020102'), 'P-256');

    expect(r).toHaveLength(32);
    expect(s).toHaveLength(32);
    expect(r[31]).toBe(1);
    expect(s[31]).toBe(2);
    expect(r.subarray(0, 31).every((b) => b === 0)).toBe(true);
  });

  it('should strip the sign byte of a high-bit integer', () => {
    const { r } = parseDerSignature(hex('3007 02020080 020101'), 'P-256');
    expect(r[31]).toBe(0x80);
    expect(r[30]).toBe(0);
  });

  it.each([
    ['wrong outer tag', '3106 020101 020101', 'missing SEQUENCE tag'],
    ['length mismatch', '3007 020101 020102', 'SEQUENCE length does not match signature length'],
    ['bytes after s', '3007 020101 020102 00', 'trailing bytes after s'],
    ['non-minimal long-form length', '308106 020101 020101', 'non-minimal length encoding'],
    ['missing r tag', '3006 030101 020101', 'missing INTEGER tag for r'],
    ['missing s tag', '3006 020101 030101', 'missing INTEGER tag for s'],
    ['negative r', '3006 020181 020101', 'r is negative'],
    ['negative s', '3006 020101 020181', 's is negative'],
    ['padded r', '3007 02020001 020101', 'r is not minimally encoded'],
    ['zero r', '3006 020100 020101', 'r is zero'],
    ['zero s', '3006 020101 020100', 's is zero'],
  ])('should reject %s', (_label, input, message) => {
    expect(() => parseDerSignature(hex(input), 'P-256')).toThrow(message);
  });

  it('should reject integers wider than the curve', () => {
    const wide = '0221' + '01' + 'ff'.repeat(32);
    const der = hex('3026' + wide + '020101');
    expect(() => parseDerSignature(der, 'P-256')).toThrow('r is wider than the curve order');
  });

  it('should reject an empty signature', () => {
    expect(() => parseDerSignature(new Uint8Array(0), 'P-256')).toThrow('missing SEQUENCE tag');
  });

  it.each([
    ['p256', 'P-256', 'sha256', 64],
    ['p384', 'P-384', 'sha384', 96],
    ['p521', 'P-521', 'sha512', 132],
    ['secp256k1', 'secp256k1', 'sha256', 64],
  ] as const)('should accept real %s signatures', (kind, curve, digest, p1363Length) => {
    const { privateKey, publicKey } = testKeyPair(kind);
    const message = Buffer.from('hello metadata');
    const der = new Uint8Array(sign(digest, message, privateKey));

    const p1363 = derToP1363(der, curve);

    expect(p1363).toHaveLength(p1363Length);
    expect(verify(digest, message, { key: publicKey, dsaEncoding: 'ieee-p1363' }, p1363)).toBe(true);
  });
});
