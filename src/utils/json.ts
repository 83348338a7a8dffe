const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parsesAsObject = (candidate: string): boolean => {
  try {
    return isJsonObject(JSON.parse(candidate));
  } catch {
    return false;
  }
};

/** End index of the balanced `{...}` starting at `start`, skipping braces inside strings. */
const balancedEnd = (text: string, start: number): number => {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const ch = text[index];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === "\"") inString = false;
      continue;
    }
    if (ch === "\"") inString = true;
    else if (ch === "{") depth += 1;
    else if (ch === "}") {
      depth -= 1;
      if (depth === 0) return index;
    }
  }
  return -1;
};

const firstObjectIn = (text: string): string | null => {
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const end = balancedEnd(text, start);
    if (end === -1) return null;
    const candidate = text.slice(start, end + 1);
    if (parsesAsObject(candidate)) return candidate;
  }
  return null;
};

/** Pulls the first JSON object out of model output, preferring fenced code blocks. */
export const extractJsonObject = (text: string): string => {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/gi;
  for (const match of text.matchAll(fenced)) {
    const body = match[1].trim();
    if (parsesAsObject(body)) return body;
    const nested = firstObjectIn(body);
    if (nested) return nested;
  }

  const bare = firstObjectIn(text);
  if (bare) return bare;

  throw new Error("No JSON object found in model output.");
};
