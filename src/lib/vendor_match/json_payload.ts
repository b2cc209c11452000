const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)```/i;

function balancedSlice(text: string, start: number): string | null {
  const open = text[start];
  const close = open === "{" ? "}" : "]";
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === open) depth += 1;
    else if (ch === close) {
      depth -= 1;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pulls a JSON value out of model prose: a fenced ```json block first, else
 * the first balanced object or array. Returns undefined when neither parses.
 */
export function extractJsonPayload(text: string): unknown {
  const fenced = FENCED_JSON.exec(text);
  if (fenced) {
    const parsed = tryParse(fenced[1].trim());
    if (parsed !== undefined) return parsed;
  }

  const objectStart = text.indexOf("{");
  const arrayStart = text.indexOf("[");
  const starts = [objectStart, arrayStart].filter((index) => index >= 0).sort((a, b) => a - b);
  for (const start of starts) {
    const slice = balancedSlice(text, start);
    if (!slice) continue;
    const parsed = tryParse(slice);
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}
