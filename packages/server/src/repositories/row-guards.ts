// SQLite hands back rows as unknown; these narrow individual columns.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value)
  );
}

export function readString(
  data: Record<string, unknown>,
  key: string
): string | null {
  const value = data[key];
  if (typeof value === 'string') {
    return value;
  }
  return null;
}

export function readNumber(
  data: Record<string, unknown>,
  key: string
): number | null {
  const value = data[key];
  if (typeof value === 'number') {
    return value;
  }
  return null;
}

/** SQLite stores booleans as 0/1 integers. */
export function readFlag(
  data: Record<string, unknown>,
  key: string
): boolean | null {
  const value = data[key];
  if (value === 1 || value === true) {
    return true;
  }
  if (value === 0 || value === false) {
    return false;
  }
  return null;
}

export function readNullableString(
  data: Record<string, unknown>,
  key: string
): string | null | undefined {
  const value = data[key];
  if (value === null) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  return undefined;
}
