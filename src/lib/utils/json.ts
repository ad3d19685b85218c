const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/;

/**
 * Returns the end index (exclusive) of the object that opens at `start`, or -1
 * when the text ends before its braces balance. Braces inside string literals
 * do not count.
 */
function scanObject(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function decodes(candidate: string): boolean {
  try {
    JSON.parse(candidate);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pulls the JSON payload out of a model answer that may wrap it in a markdown
 * fence or surround it with prose. The result is not guaranteed to be JSON;
 * decoding it is the caller's job.
 */
export function extractJson(text: string): string {
  const fenced = FENCED_BLOCK.exec(text);
  if (fenced) {
    return fenced[1];
  }

  let firstBalanced: string | undefined;
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = scanObject(text, start);
    // Every later brace sits inside this unclosed object.
    if (end === -1) break;
    const candidate = text.slice(start, end);
    if (decodes(candidate)) return candidate;
    firstBalanced ??= candidate;
  }
  if (firstBalanced !== undefined) {
    return firstBalanced;
  }

  // Unbalanced (usually a truncated answer): outermost braces
  const first = text.indexOf('{');
  const last = text.lastIndexOf('}');
  if (first !== -1 && last > first) {
    return text.slice(first, last + 1);
  }

  return text;
}
