import { createHash, createPublicKey, type KeyObject } from 'node:crypto';
import { KeyFormatError, UnsupportedKeyError } from './errors.js';
import type { EcCurve, KeyFamily } from './types.js';

export const SUPPORTED_RSA_KEY_SIZES: readonly number[] = [2048, 3072, 4096];

/** OpenSSL curve names as reported by node:crypto. */
const CURVE_BY_OPENSSL_NAME: Readonly<Record<string, EcCurve>> = {
  prime256v1: 'P-256',
  secp384r1: 'P-384',
  secp521r1: 'P-521',
  secp256k1: 'secp256k1',
};

/** Byte width of a scalar (r, s) for each curve. */
export const CURVE_FIELD_BYTES: Readonly<Record<EcCurve, number>> = {
  'P-256': 32,
  'P-384': 48,
  'P-521': 66,
  secp256k1: 32,
};

export interface DecodedPublicKey {
  family: KeyFamily;
  keySize?: number;
  curve?: EcCurve;
  /** Canonical SPKI DER re-exported from the parsed key. */
  der: Uint8Array;
}

/**
 * Decode a DER SubjectPublicKeyInfo and classify it.
 *
 * Throws KeyFormatError when the bytes are not a DER public key and
 * UnsupportedKeyError when the key type, modulus length or curve has no
 * signing algorithm.
 */
export function decodePublicKey(der: Uint8Array, keyReference: string): DecodedPublicKey {
  let key: KeyObject;
  try {
    key = createPublicKey({ key: Buffer.from(der), format: 'der', type: 'spki' });
  } catch (error) {
    throw new KeyFormatError(`Public key for ${keyReference} is not a DER SubjectPublicKeyInfo`, {
      cause: error,
    });
  }

  const canonical = new Uint8Array(key.export({ format: 'der', type: 'spki' }));
  const details = key.asymmetricKeyDetails ?? {};

  switch (key.asymmetricKeyType) {
    case 'rsa': {
      const keySize = details.modulusLength;
      if (keySize === undefined || !SUPPORTED_RSA_KEY_SIZES.includes(keySize)) {
        throw new UnsupportedKeyError(
          `RSA key for ${keyReference} has unsupported modulus length ${keySize ?? 'unknown'}`,
        );
      }
      return { family: 'rsa', keySize, der: canonical };
    }
    case 'ec': {
      const curve = details.namedCurve ? CURVE_BY_OPENSSL_NAME[details.namedCurve] : undefined;
      if (!curve) {
        throw new UnsupportedKeyError(
          `EC key for ${keyReference} uses unsupported curve ${details.namedCurve ?? 'unknown'}`,
        );
      }
      return { family: 'ecdsa', curve, der: canonical };
    }
    default:
      throw new UnsupportedKeyError(
        `Key for ${keyReference} has unsupported type ${key.asymmetricKeyType ?? 'unknown'}`,
      );
  }
}

/** Lowercase hex SHA-256 over the given DER. Same bytes always give the same id. */
export function deriveKeyId(der: Uint8Array): string {
  return createHash('sha256').update(der).digest('hex');
}

/** Wrap SPKI DER in a PEM envelope with 64-column base64 lines. */
export function derToPem(der: Uint8Array): string {
  const b64 = Buffer.from(der).toString('base64');
  const lines = b64.match(/.{1,64}/g) ?? [];
  return `-----BEGIN PUBLIC KEY-----\n${lines.join('\n')}\n-----END PUBLIC KEY-----\n`;
}

/**
 * Parse a strict DER ECDSA signature.
 *
 * DER format: 0x30 <len> 0x02 <r-len> <r-bytes> 0x02 <s-len> <s-bytes>
 *
 * Lengths must be minimally encoded, each INTEGER positive, non-zero and
 * minimal, no wider than the curve's field, and nothing may follow the
 * SEQUENCE. Returns r and s left-padded to the field width.
 */
export function parseDerSignature(
  der: Uint8Array,
  curve: EcCurve,
): { r: Uint8Array; s: Uint8Array } {
  const width = CURVE_FIELD_BYTES[curve];
  let offset = 0;

  if (der[offset++] !== 0x30) {
    throw new Error('missing SEQUENCE tag');
  }
  const [seqLen, afterLen] = readLength(der, offset);
  offset = afterLen;
  if (offset + seqLen !== der.length) {
    throw new Error('SEQUENCE length does not match signature length');
  }

  const r = readInteger(der, offset, width, 'r');
  const s = readInteger(der, r.next, width, 's');
  if (s.next !== der.length) {
    throw new Error('trailing bytes after s');
  }

  return { r: padTo(r.value, width), s: padTo(s.value, width) };
}

/** Convert a DER ECDSA signature to the fixed-width IEEE P1363 form (r || s). */
export function derToP1363(der: Uint8Array, curve: EcCurve): Uint8Array {
  const { r, s } = parseDerSignature(der, curve);
  const out = new Uint8Array(r.length + s.length);
  out.set(r, 0);
  out.set(s, r.length);
  return out;
}

function readLength(der: Uint8Array, offset: number): [number, number] {
  const first = der[offset];
  if (first === undefined) throw new Error('truncated length');
  if (first < 0x80) return [first, offset + 1];
  // Signatures never exceed 255 bytes, so only the 0x81 long form is legal.
  if (first !== 0x81) throw new Error('unsupported length encoding');
  const value = der[offset + 1];
  if (value === undefined) throw new Error('truncated length');
  if (value < 0x80) throw new Error('non-minimal length encoding');
  return [value, offset + 2];
}

function readInteger(
  der: Uint8Array,
  offset: number,
  width: number,
  label: string,
): { value: Uint8Array; next: number } {
  if (der[offset] !== 0x02) {
    throw new Error(`missing INTEGER tag for ${label}`);
  }
  const [len, start] = readLength(der, offset + 1);
  const end = start + len;
  if (len === 0 || end > der.length) {
    throw new Error(`invalid length for ${label}`);
  }

  const bytes = der.subarray(start, end);
  const lead = bytes[0] ?? 0;
  if (lead & 0x80) {
    throw new Error(`${label} is negative`);
  }
  if (lead === 0 && bytes.length > 1 && ((bytes[1] ?? 0) & 0x80) === 0) {
    throw new Error(`${label} is not minimally encoded`);
  }

  const value = lead === 0 ? bytes.subarray(1) : bytes;
  if (value.length === 0 || value.every((b) => b === 0)) {
    throw new Error(`${label} is zero`);
  }
  if (value.length > width) {
    throw new Error(`${label} is wider than the curve order`);
  }
  return { value, next: end };
}

/** Left-pad a byte array to `width` bytes */
function padTo(bytes: Uint8Array, width: number): Uint8Array {
  if (bytes.length === width) return bytes;
  const padded = new Uint8Array(width);
  padded.set(bytes, width - bytes.length);
  return padded;
}
