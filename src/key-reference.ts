import { z } from 'zod';
import { KeyReferenceError } from './errors.js';
import type { KeyReference } from './types.js';

const keyReferenceSchema = z.object({
  uri: z.string().min(1),
  scheme: z
    .string()
    .regex(/^[a-z][a-z0-9+.-]*$/, 'scheme must be lowercase URI scheme characters'),
  resourceId: z.string().min(1, 'resource id is required'),
  region: z.string().min(1).optional(),
  profile: z.string().min(1).optional(),
});

/**
 * Parse a key-reference URI.
 *
 * `kms://<resource-id>[?region=..&profile=..]` takes everything after the
 * scheme as the resource id, so ARNs (`arn:aws:kms:...:key/...`) and aliases
 * (`alias/name`) need no escaping. `aws-kms://[profile]/<key-id>` carries the
 * credentials profile in the host position.
 */
export function parseKeyReference(uri: string): KeyReference {
  const match = /^([^:/?#]+):\/\/(.*)$/.exec(uri.trim());
  if (!match) {
    throw new KeyReferenceError(`Key reference must look like <scheme>://<resource>: ${uri}`);
  }
  const scheme = (match[1] ?? '').toLowerCase();
  const [rest = '', query = ''] = splitOnce(match[2] ?? '', '?');
  const params = new URLSearchParams(query);

  let resourceId = rest;
  let profile = params.get('profile') ?? undefined;
  if (scheme === 'aws-kms') {
    const [host = '', path = ''] = splitOnce(rest, '/');
    profile = host || profile;
    resourceId = path;
  }

  const parsed = keyReferenceSchema.safeParse({
    uri,
    scheme,
    resourceId: safeDecode(resourceId),
    region: params.get('region') ?? undefined,
    profile,
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new KeyReferenceError(`Invalid key reference ${uri}: ${detail}`);
  }
  return Object.freeze(parsed.data);
}

function splitOnce(value: string, separator: string): [string, string] {
  const index = value.indexOf(separator);
  if (index === -1) return [value, ''];
  return [value.slice(0, index), value.slice(index + separator.length)];
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    throw new KeyReferenceError(`Key reference resource is not valid percent-encoding: ${value}`, {
      cause: error,
    });
  }
}
