export function stripCodeFences(text: string): string {
  return text.replace(/```[a-zA-Z]*/g, "").trim();
}

/** Index of the `]` closing the `[` at `start`, skipping brackets inside JSON strings; -1 if unbalanced. */
function closingBracket(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "[") depth++;
    else if (ch === "]" && --depth === 0) return i;
  }
  return -1;
}

/**
 * Pulls the first JSON array out of free-form model output.
 * Code fences and prose before/after the array are ignored, including
 * bracketed prose such as "[JSON format]".
 */
export function extractJsonArray(text: string): unknown {
  const cleaned = stripCodeFences(text);
  let parseError: unknown = null;

  let start = cleaned.indexOf("[");
  while (start !== -1) {
    const end = closingBracket(cleaned, start);
    if (end === -1) {
      start = cleaned.indexOf("[", start + 1);
      continue;
    }
    try {
      return JSON.parse(cleaned.slice(start, end + 1));
    } catch (e) {
      parseError = e;
    }
    start = cleaned.indexOf("[", end + 1);
  }

  if (parseError) throw parseError;
  throw new SyntaxError("Model did not return a JSON array.");
}
