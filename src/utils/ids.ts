export function newId(prefix: string): string {
  return `${prefix}_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

export function utcDay(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}
