export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function toIso(ms: number) {
  return new Date(ms).toISOString();
}

/** Accepts the ISO strings we write and the Date objects pg hands back. */
export function isoFrom(value: string | Date): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function clamp(value: number, min: number, max: number) {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, value));
}
