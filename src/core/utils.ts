export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(): string {
  const stamp = isoNow().replace(/[-:]/g, "").replace(/\..+$/, "");
  const suffix = Math.random().toString(36).slice(2, 6);
  return `${stamp}-${suffix}`;
}

export function ensureTrailingNewline(text: string): string {
  const trimmed = text.trimEnd();
  return trimmed.length === 0 ? "" : `${trimmed}\n`;
}

export function truncateText(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return `${text.slice(0, limit)}\n...[truncated ${text.length - limit} chars]`;
}
