/**
 * Return the first balanced `{...}` block in `content`, ignoring braces inside
 * JSON strings. Returns null when no complete object is present.
 */
export function extractFirstJsonObject(content: string): string | null {
  const start = content.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let idx = start; idx < content.length; idx += 1) {
    const char = content[idx];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (char === '\\' && inString) {
      escaped = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (char === '{') depth += 1;
    if (char === '}') {
      depth -= 1;
      if (depth === 0) {
        return content.slice(start, idx + 1);
      }
    }
  }

  return null;
}

function stripCodeFence(content: string): string {
  const fenced = content.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : content.trim();
}

/**
 * Parse model output that should be a JSON object but may arrive fenced or
 * wrapped in prose. Returns undefined when nothing parseable is found.
 */
export function parseJsonLenient(content: string): unknown {
  const stripped = stripCodeFence(content);
  try {
    return JSON.parse(stripped);
  } catch {
    const candidate = extractFirstJsonObject(stripped);
    if (!candidate) return undefined;
    try {
      return JSON.parse(candidate);
    } catch {
      return undefined;
    }
  }
}
