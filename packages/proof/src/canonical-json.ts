function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function write(value: unknown, seen: Set<object>, path: string): string {
  if (value === null) return 'null';
  if (typeof value === 'string' || typeof value === 'boolean') return JSON.stringify(value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new TypeError(`Non-finite number at ${path}`);
    return JSON.stringify(value);
  }
  if (typeof value !== 'object') throw new TypeError(`Cannot serialize ${typeof value} at ${path}`);

  if (hasToJSON(value)) return write(value.toJSON(), seen, path);
  if (seen.has(value)) throw new TypeError(`Circular reference at ${path}`);
  seen.add(value);

  let out: string;
  if (Array.isArray(value)) {
    out = `[${value.map((item, i) => write(item, seen, `${path}[${i}]`)).join(',')}]`;
  } else {
    const members: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member === undefined) continue;
      members.push(`${JSON.stringify(key)}:${write(member, seen, `${path}.${key}`)}`);
    }
    out = `{${members.join(',')}}`;
  }

  seen.delete(value);
  return out;
}

/**
 * JSON with object keys sorted recursively and no whitespace, so equal data
 * always serializes to identical bytes. Undefined object members are dropped;
 * anything else JSON cannot represent throws a TypeError.
 */
export function canonicalize(value: unknown): string {
  return write(value, new Set(), '$');
}
