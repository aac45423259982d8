import { ResponseParseError, errorMessage } from '../../utils/errors.js';

const CLOSERS: Record<string, string> = { '{': '}', '[': ']' };

const PARTIAL_NUMBER = /-?\d[\d.eE+-]*$|-$/;
const PARTIAL_LITERAL = /([\s:,[])(?:t|tr|tru|f|fa|fal|fals|n|nu|nul)$/;

export interface LenientParse {
  value: unknown;
  repaired: boolean;
}

/**
 * Drops code fences and any prose before the first `{` or `[`.
 */
export function stripToJson(raw: string): string {
  const fenced = /```(?:json|JSON)?[ \t]*\n?([\s\S]*?)(?:```|$)/.exec(raw);
  const body = fenced ? fenced[1] : raw;
  const start = body.search(/[[{]/);
  return start === -1 ? body.trim() : body.slice(start);
}

const isEscapedAt = (text: string, index: number): boolean => {
  let backslashes = 0;
  for (let i = index - 1; i >= 0 && text[i] === '\\'; i--) {
    backslashes++;
  }
  return backslashes % 2 === 1;
};

/** Start index of the string literal that ends at the last character of `text`. */
const lastStringStart = (text: string): number => {
  for (let i = text.length - 2; i >= 0; i--) {
    if (text[i] === '"' && !isEscapedAt(text, i)) return i;
  }
  return -1;
};

/**
 * Removes whatever cannot precede the closer of `open`: trailing commas,
 * keys without values, and half-written numbers or literals.
 */
function trimDangling(out: string, open: string): string {
  let text = out;

  for (;;) {
    const trimmed = text.trimEnd();

    if (trimmed.endsWith(',')) {
      text = trimmed.slice(0, -1);
      continue;
    }

    if (trimmed.endsWith(':')) {
      const beforeColon = trimmed.slice(0, -1).trimEnd();
      const keyStart = beforeColon.endsWith('"') ? lastStringStart(beforeColon) : -1;
      text = keyStart === -1 ? beforeColon : beforeColon.slice(0, keyStart);
      continue;
    }

    if (open === '{' && trimmed.endsWith('"')) {
      const start = lastStringStart(trimmed);
      const preceding = trimmed.slice(0, Math.max(0, start)).trimEnd();
      if (start !== -1 && (preceding.endsWith('{') || preceding.endsWith(','))) {
        text = preceding;
        continue;
      }
    }

    if (/[.eE+-]$/.test(trimmed) && PARTIAL_NUMBER.test(trimmed)) {
      text = trimmed.replace(PARTIAL_NUMBER, '');
      continue;
    }

    if (PARTIAL_LITERAL.test(trimmed)) {
      text = trimmed.replace(PARTIAL_LITERAL, '$1');
      continue;
    }

    return trimmed;
  }
}

/**
 * Best-effort recovery of a model's JSON output. Converts single-quoted
 * strings, strips trailing commas, closes an unterminated string and any
 * unbalanced brackets, and cuts everything after the first complete
 * top-level value. Never throws; the result may still be invalid JSON.
 */
export function repairJson(raw: string): string {
  const text = stripToJson(raw);
  const stack: string[] = [];
  let out = '';
  let quote: '"' | "'" | null = null;
  let escaped = false;

  for (const ch of text) {
    if (quote) {
      if (escaped) {
        escaped = false;
        out = quote === "'" && ch === "'" ? out.slice(0, -1) + "'" : out + ch;
        continue;
      }
      if (ch === '\\') {
        escaped = true;
        out += ch;
      } else if (ch === quote) {
        quote = null;
        out += '"';
      } else if (ch === '"') {
        out += '\\"';
      } else if (ch < ' ') {
        out += JSON.stringify(ch).slice(1, -1);
      } else {
        out += ch;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      out += '"';
    } else if (ch === '{' || ch === '[') {
      stack.push(ch);
      out += ch;
    } else if (ch === '}' || ch === ']') {
      const open = stack[stack.length - 1];
      if (open === undefined || CLOSERS[open] !== ch) continue;
      out = trimDangling(out, open) + ch;
      stack.pop();
      if (stack.length === 0) break;
    } else {
      out += ch;
    }
  }

  if (quote) {
    if (escaped) out = out.slice(0, -1);
    out += '"';
  }

  while (stack.length > 0) {
    const open = stack.pop();
    if (open === undefined) break;
    out = trimDangling(out, open) + CLOSERS[open];
  }

  return out;
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: string };

const tryParse = (text: string): ParseAttempt => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
};

/**
 * Parses `text` as JSON, falling back to `repairJson` once.
 */
export function parseJsonLenient(text: string): LenientParse {
  const direct = tryParse(text.trim());
  if (direct.ok) {
    return { value: direct.value, repaired: false };
  }

  const repaired = tryParse(repairJson(text));
  if (repaired.ok) {
    return { value: repaired.value, repaired: true };
  }

  throw new ResponseParseError('Response is not valid JSON after repair', {
    error: repaired.error,
    preview: text.slice(0, 200),
  });
}
