export function nowIso(): string {
  return new Date().toISOString();
}

export function addMs(iso: string, ms: number): string {
  return new Date(Date.parse(iso) + ms).toISOString();
}

export function isPast(iso: string, now = Date.now()): boolean {
  return Date.parse(iso) <= now;
}
