import type { z } from 'zod';

export type Rng = () => number;

/** `Omit` applied to each member of a union separately. */
export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export function envFlag(name: string): boolean {
  const v = (process.env[name] ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function envSeed(): number | undefined {
  const raw = process.env.KRIPKE_CREW_SEED;
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function shuffleInPlace<T>(arr: T[], rng: Rng): void {
  // Fisher-Yates shuffle (deterministic given `rng`).
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const a = arr[i];
    const b = arr[j];
    if (a === undefined || b === undefined) continue;
    arr[i] = b;
    arr[j] = a;
  }
}

export function pickOne<T>(items: readonly T[], rng: Rng): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.min(items.length - 1, Math.floor(rng() * items.length))];
}

export function uniform(rng: Rng, [min, max]: readonly [number, number]): number {
  return min + (max - min) * rng();
}

/**
 * Pick one option with probability proportional to its weight. Options with a
 * non-positive weight are never picked.
 */
export function weightedPick<T>(options: ReadonlyArray<{ weight: number; value: T }>, rng: Rng): T | undefined {
  const live = options.filter(o => o.weight > 0);
  const total = live.reduce((acc, o) => acc + o.weight, 0);
  if (total <= 0) return undefined;
  let roll = rng() * total;
  for (const o of live) {
    roll -= o.weight;
    if (roll < 0) return o.value;
  }
  return live[live.length - 1]?.value;
}

/** Code-point order, independent of the runtime's locale. */
export function byId(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

/**
 * Validate `value` against `schema`, throwing a plain Error that names `label`
 * and every failed field.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid ${label}: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}
