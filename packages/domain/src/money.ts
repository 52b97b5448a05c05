/** Rounds half away from zero to two decimal places, matching `numeric(15,2)` columns. */
export function roundMoney(value: number): number {
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100;
}

export function addMoney(...values: number[]): number {
  return roundMoney(values.reduce((sum, value) => sum + value, 0));
}

export function clamp(value: number, floor: number, cap: number): number {
  return Math.min(Math.max(value, floor), cap);
}

/** Parses a `numeric` column value (returned as a string by the driver). */
export function parseMoney(value: string | number): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new TypeError(`Invalid money value: ${String(value)}`);
  }
  return roundMoney(parsed);
}
