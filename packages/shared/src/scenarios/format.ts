/** Fixed-point rendering used by every template. */
export function fixed(value: number, digits: number): string {
  return value.toFixed(digits)
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

export function plural(count: number, noun: string): string {
  return count === 1 ? `${count} ${noun}` : `${count} ${noun}s`
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180
}

export function titleCase(text: string): string {
  return text
    .split(/[\s_]+/)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ")
}

export const GRAVITY = 9.81

/** Rounds to at most `maxDigits` and drops trailing zeros: 7.5, 15, 0.3. */
export function num(value: number, maxDigits = 1): string {
  const rounded = roundTo(value, maxDigits)
  return String(Object.is(rounded, -0) ? 0 : rounded)
}
