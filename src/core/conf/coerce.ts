const TRUE_LITERALS = new Set(["true", "on", "yes", "1"]);
const FALSE_LITERALS = new Set(["false", "off", "no", "0"]);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseBoolean(value: string): boolean | undefined {
  if (TRUE_LITERALS.has(value)) {
    return true;
  }
  if (FALSE_LITERALS.has(value)) {
    return false;
  }
  return undefined;
}

// Integers outside the safe range would lose precision as a number.
export function parseInteger(value: string): number | undefined {
  if (!INTEGER_PATTERN.test(value)) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export function parseFloatValue(value: string): number | undefined {
  if (!FLOAT_PATTERN.test(value)) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
