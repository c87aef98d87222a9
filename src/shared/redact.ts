/**
 * Masks the password of a connection string so it can be logged, printed or
 * written into the schema cache. Strings that do not parse as URLs come back
 * as a fixed placeholder rather than verbatim.
 */
export function redactConnectionString(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) parsed.password = '****';
    return parsed.toString();
  } catch {
    return '(from DATABASE_URL)';
  }
}

/** host:port/database label, as shown in the CLI banners. */
export function describeDatabase(url: string): string {
  try {
    const u = new URL(url);
    return `${u.hostname}:${u.port || '5432'}${u.pathname || ''}`;
  } catch {
    return '(from DATABASE_URL)';
  }
}
