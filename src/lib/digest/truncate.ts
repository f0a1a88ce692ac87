const NOTE = '\n\n(…recortado)';

export function truncateForChannel(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) return { text, truncated: false };

  // Limit shorter than the note itself: plain cut, no note.
  if (maxChars <= NOTE.length + 5) {
    return { text: text.slice(0, maxChars).replace(/\s+$/g, ''), truncated: true };
  }

  // Text gets whatever the note leaves over.
  const budget = Math.max(0, maxChars - NOTE.length);
  const trimmed = text.slice(0, budget).replace(/\s+$/g, '');
  return { text: (trimmed + NOTE).slice(0, maxChars), truncated: true };
}
