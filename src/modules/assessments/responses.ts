import { scalarResponseSchema } from './schema';

export type LikertScale = { min: number; max: number };

export type ReadResult<T> = { ok: true; value: T } | { ok: false; reason: string };

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Reads `{ response: "<int>" }` (string or number) and checks it against the scale.
 * Non-integers, booleans and out-of-range values are rejected rather than clamped.
 */
export function readLikert(entry: unknown, scale: LikertScale): ReadResult<number> {
  const parsed = scalarResponseSchema.safeParse(entry);
  if (!parsed.success) return { ok: false, reason: 'expected an object with a response field' };

  const raw = parsed.data.response;
  let value: number;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && INTEGER_PATTERN.test(raw.trim())) {
    value = Number(raw.trim());
  } else {
    return { ok: false, reason: `response ${JSON.stringify(raw)} is not an integer` };
  }

  if (!Number.isInteger(value)) return { ok: false, reason: `response ${value} is not an integer` };
  if (value < scale.min || value > scale.max) {
    return { ok: false, reason: `response ${value} is outside ${scale.min}-${scale.max}` };
  }
  return { ok: true, value };
}

export function readChoice<T extends string>(entry: unknown, options: readonly T[]): ReadResult<T> {
  const parsed = scalarResponseSchema.safeParse(entry);
  if (!parsed.success) return { ok: false, reason: 'expected an object with a response field' };

  const raw = parsed.data.response;
  if (typeof raw !== 'string') return { ok: false, reason: `response ${JSON.stringify(raw)} is not a choice` };

  const normalized = raw.trim().toLowerCase();
  const match = options.find((option) => option === normalized);
  if (!match) return { ok: false, reason: `response "${raw}" is not one of ${options.join(', ')}` };
  return { ok: true, value: match };
}

export function readFlag(entry: unknown): ReadResult<boolean> {
  const parsed = scalarResponseSchema.safeParse(entry);
  if (!parsed.success) return { ok: false, reason: 'expected an object with a response field' };
  if (typeof parsed.data.response !== 'boolean') {
    return { ok: false, reason: `response ${JSON.stringify(parsed.data.response)} is not a boolean` };
  }
  return { ok: true, value: parsed.data.response };
}

/** Question ids 1..count as the string keys raw response sets use. */
export function questionIds(count: number): string[] {
  return Array.from({ length: count }, (_, idx) => String(idx + 1));
}
