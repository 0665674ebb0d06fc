import crypto from 'crypto';

type Normalized = string | number | boolean | null | Normalized[] | { [key: string]: Normalized };

function normalize(value: unknown): Normalized {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.normalize('NFC');
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map(normalize);
  if (typeof value === 'object') {
    const out: { [key: string]: Normalized } = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) out[key] = normalize(entry);
    }
    return out;
  }
  return String(value);
}

/** JSON with recursively sorted keys and NFC strings. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(normalize(value));
}

export function fingerprint(kind: string, input: unknown): string {
  return crypto
    .createHash('sha256')
    .update(kind)
    .update('\n')
    .update(canonicalJson(input))
    .digest('hex');
}
