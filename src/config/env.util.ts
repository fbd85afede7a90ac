export type Env = Record<string, string | undefined>;

export function readString(env: Env, name: string, fallback = ''): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

export function readInt(env: Env, name: string, fallback: number): number {
  const parsed = parseInt(env[name] ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function readFloat(env: Env, name: string, fallback: number): number {
  const parsed = parseFloat(env[name] ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function readList(env: Env, name: string): string[] {
  return readString(env, name)
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}
