export function isIntegerInRange(value: number, min: number, max: number): boolean {
  return Number.isSafeInteger(value) && value >= min && value <= max;
}

export function isBlank(value: string): boolean {
  return value.trim().length === 0;
}
