/**
 * Remove a markdown code fence wrapping the whole text, e.g. a report the
 * model returned as ```markdown ... ```. Fences inside the text are kept.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(/^```[\w-]*[ \t]*\n([\s\S]*?)\n?```$/);
  return match ? match[1].trim() : trimmed;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
