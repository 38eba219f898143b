const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/;
const ARRAY_LITERAL = /\[[\s\S]*\]/;
const OBJECT_LITERAL = /\{[\s\S]*\}/;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Pull a JSON value out of free-form model output.
 *
 * Prefers the contents of a fenced code block, then the whole text, then the
 * widest `[...]` span, then the widest `{...}` span. Returns undefined when
 * none of them parse.
 */
export function parseStructured(text: string | null | undefined): unknown {
  if (!text) return undefined;

  const fenced = FENCED_BLOCK.exec(text);
  const candidate = fenced?.[1] !== undefined ? fenced[1].trim() : text;

  const direct = tryParse(candidate);
  if (direct.ok) return direct.value;

  for (const pattern of [ARRAY_LITERAL, OBJECT_LITERAL]) {
    const match = pattern.exec(candidate);
    if (!match) continue;
    const parsed = tryParse(match[0]);
    if (parsed.ok) return parsed.value;
  }

  return undefined;
}
