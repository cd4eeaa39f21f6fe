import { readFileSync } from 'node:fs';

export type OutputFormat = 'json' | 'human' | 'raw';

/**
 * Parse --output flag from argv.
 * Returns 'json' as default when not specified.
 */
export function parseOutputFormat(argv: string[]): OutputFormat {
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--output') {
      const fmt = argv[i + 1];
      if (!fmt || fmt.startsWith('--')) {
        throw new Error('Missing value for --output. Use json, human, or raw');
      }
      if (fmt === 'json' || fmt === 'human' || fmt === 'raw') return fmt;
      throw new Error(`Invalid output format: ${fmt}. Use json, human, or raw`);
    }
  }
  return 'json';
}

export function toJson(data: unknown, pretty = true): string {
  return JSON.stringify(data, null, pretty ? 2 : 0);
}

/** Read all of stdin as bytes */
export async function readStdin(input: NodeJS.ReadableStream = process.stdin): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return new Uint8Array(Buffer.concat(chunks));
}

/** Read the bytes to sign from a file, or from stdin when path is '-' */
export async function readInput(path: string): Promise<Uint8Array> {
  if (path === '-') return readStdin();
  return new Uint8Array(readFileSync(path));
}

/** Format key-value record as aligned table */
export function toHuman(data: Record<string, unknown>, title?: string): string {
  const lines: string[] = [];
  if (title) lines.push(`--- ${title} ---`);
  const keys = Object.keys(data);
  if (keys.length === 0) return lines.join('\n');
  const maxKeyLen = Math.max(...keys.map((k) => k.length));
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined) continue;
    const v = typeof value === 'object' && value !== null ? toJson(value, false) : String(value);
    lines.push(`${key.padEnd(maxKeyLen)}  ${v}`);
  }
  return lines.join('\n');
}
