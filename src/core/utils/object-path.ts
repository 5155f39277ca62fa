export function getByPath(obj: unknown, dottedPath: string): unknown {
  if (!dottedPath) {
    return obj;
  }
  return dottedPath.split(".").reduce<unknown>((acc, part) => (isRecord(acc) ? acc[part] : undefined), obj);
}

export function setByPath(obj: Record<string, unknown>, dottedPath: string, value: unknown): Record<string, unknown> {
  const parts = dottedPath.split(".");
  const last = parts.pop();
  if (last === undefined) {
    return obj;
  }

  let cursor = obj;
  for (const part of parts) {
    const next = cursor[part];
    if (isRecord(next)) {
      cursor = next;
      continue;
    }
    const created: Record<string, unknown> = {};
    cursor[part] = created;
    cursor = created;
  }

  cursor[last] = value;
  return obj;
}

export function unsetByPath(obj: Record<string, unknown>, dottedPath: string): boolean {
  const parts = dottedPath.split(".");
  const last = parts.pop();
  if (last === undefined) {
    return false;
  }

  let cursor = obj;
  for (const part of parts) {
    const next = cursor[part];
    if (!isRecord(next)) {
      return false;
    }
    cursor = next;
  }
  if (!(last in cursor)) {
    return false;
  }
  delete cursor[last];
  return true;
}

/** Accepts JSON literals (numbers, booleans, null, quoted strings); anything else stays a string. */
export function parseConfigValue(input: string): unknown {
  try {
    return JSON.parse(input.trim());
  } catch {
    return input;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
