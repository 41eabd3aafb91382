const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Integer conversion that yields null instead of throwing.
 * Numbers are truncated toward zero; strings must be plain integers.
 */
export function safeInt(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "string" && INTEGER_PATTERN.test(value)) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

export function safeFloat(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Engagement counter: a safe integer that is never negative.
 */
export function safeCount(value: unknown): number | null {
  const parsed = safeInt(value);
  return parsed !== null && parsed >= 0 ? parsed : null;
}

export function roundTo(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
