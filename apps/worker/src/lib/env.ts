export function requiredEnv(name: string): string {
  const v = process.env[name];
  if (!v) throw new Error(`Missing required env var: ${name}`);
  return v;
}

export function optionalEnv(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

export function numberEnv(name: string, fallback: number): number {
  const v = optionalEnv(name);
  if (!v) return fallback;
  const n = Number(v);
  if (!Number.isFinite(n)) return fallback;
  return n;
}

// Counts and versions: fractional or negative values fall back.
export function positiveIntEnv(name: string, fallback: number): number {
  const n = numberEnv(name, fallback);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}
