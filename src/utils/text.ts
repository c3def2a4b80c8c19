export function truncate(s: string, max: number): string {
  return s.length > max ? s.slice(0, max) : s;
}

export function preview(value: unknown, max = 300): string {
  const s = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
  return s.length > max ? s.slice(0, max) + '…' : s;
}

function isJson(s: string): boolean {
  try {
    JSON.parse(s);
    return true;
  } catch {
    return false;
  }
}

// Pull a single JSON object out of model output (code fences, stray prose).
export function sanitizeToJson(content: string): string | null {
  if (!content) return null;
  let s = content.trim();
  s = s.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/i, '').trim();
  if (isJson(s)) return s;
  const start = s.indexOf('{');
  const end = s.lastIndexOf('}');
  if (start >= 0 && end > start) {
    const candidate = s.slice(start, end + 1).trim();
    if (isJson(candidate)) return candidate;
  }
  return null;
}
