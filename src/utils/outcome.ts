export type Outcome<T> = { ok: true; value: T } | { ok: false };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failed<T>(): Outcome<T> {
  return { ok: false };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function roundTo(value: number, decimals: number) {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function clamp01(x: number) {
  if (Number.isNaN(x)) return 0;
  return x < 0 ? 0 : x > 1 ? 1 : x;
}
