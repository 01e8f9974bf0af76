/**
 * Language Model Response Parsing
 *
 * Models wrap JSON in code fences or prose. The parser locates the first
 * balanced JSON array or object that carries transactions: either a bare
 * array of objects, or an object with a `transactions` array.
 */

export type ParsedModelResponse =
  | { ok: true; items: unknown[]; confidence: unknown }
  | { ok: false; error: string };

const FENCE_PATTERN = /```(?:json|JSON)?\s*([\s\S]*?)```/;

/**
 * Return the end index (exclusive) of the balanced structure starting at
 * `start`, or -1 when it never closes. Brackets inside strings are ignored.
 */
function findBalancedEnd(text: string, start: number): number {
  const stack: string[] = [];
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
    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      stack.push(ch === '{' ? '}' : ']');
    } else if (ch === '}' || ch === ']') {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i + 1;
    }
  }
  return -1;
}

function isPlainObject(value: unknown): boolean {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asTransactionPayload(value: unknown): { items: unknown[]; confidence: unknown } | null {
  if (Array.isArray(value)) {
    // A bare array in prose (page numbers, a list of notes) is not a payload
    return value.every(isPlainObject) ? { items: value, confidence: undefined } : null;
  }
  if (value !== null && typeof value === 'object' && 'transactions' in value) {
    const transactions: unknown = value.transactions;
    if (Array.isArray(transactions)) {
      const confidence: unknown = 'confidence' in value ? value.confidence : undefined;
      return { items: transactions, confidence };
    }
  }
  return null;
}

/**
 * Extract the transaction list from a raw model response
 */
export function parseModelResponse(raw: string): ParsedModelResponse {
  const fenced = FENCE_PATTERN.exec(raw);
  const candidates = fenced ? [fenced[1], raw] : [raw];

  for (const text of candidates) {
    for (let start = 0; start < text.length; start++) {
      const ch = text[start];
      if (ch !== '{' && ch !== '[') continue;

      const end = findBalancedEnd(text, start);
      if (end === -1) continue;

      let value: unknown;
      try {
        value = JSON.parse(text.slice(start, end));
      } catch {
        continue; // not JSON, keep scanning
      }

      const payload = asTransactionPayload(value);
      if (payload) {
        return { ok: true, ...payload };
      }
      // Skip past this structure; nested candidates were not transaction lists either
      start = end - 1;
    }
  }

  const preview = raw.trim().slice(0, 120);
  return {
    ok: false,
    error: preview
      ? `Model response contained no transaction list: "${preview}"`
      : 'Model response was empty',
  };
}
