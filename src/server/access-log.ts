/**
 * One access record per request. Payloads are never logged.
 */

export interface AccessRecord {
  method: string;
  pathname: string;
  status: number;
  /** Content-Encoding of the response, or `identity` */
  encoding: string;
  durationMs: number;
}

/** Browsers ask for a favicon on every page load; its 404s are noise. */
export function shouldLogAccess(record: AccessRecord): boolean {
  return !(record.status === 404 && record.pathname === '/favicon.ico');
}

export function formatAccessRecord(record: AccessRecord): string {
  return `${record.method} ${record.pathname} ${record.status} ${record.encoding} ${record.durationMs}ms`;
}

export function logAccess(record: AccessRecord): void {
  if (shouldLogAccess(record)) {
    console.log(formatAccessRecord(record));
  }
}
