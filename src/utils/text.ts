const TRUNCATION_MARKER = "\n\n... (trimmed)";

/** Cuts `text` to at most `maxChars`, breaking on the last paragraph or line boundary when one is close. */
export function truncateForPrompt(text: string, maxChars: number) {
  if (text.length <= maxChars) {
    return text;
  }
  const budget = Math.max(0, maxChars - TRUNCATION_MARKER.length);
  let cut = text.slice(0, budget);
  const boundary = Math.max(cut.lastIndexOf("\n\n"), cut.lastIndexOf("\n"));
  if (boundary >= budget * 0.8) {
    cut = cut.slice(0, boundary);
  }
  return `${cut.trimEnd()}${TRUNCATION_MARKER}`;
}

export function numberedSources(sources: readonly { url: string; title?: string | null }[]) {
  return sources
    .map((source, idx) => {
      const title = source.title?.trim();
      return title ? `[${idx + 1}] ${title} - ${source.url}` : `[${idx + 1}] ${source.url}`;
    })
    .join("\n");
}
