/**
 * Text budgeting for the cumulative summary and rendered recaps.
 */

export function normalize(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/[ \t]+/g, ' ').trim();
}

function splitSentences(text: string): string[] {
  const chunks = text.split(/([.!?;。！？；])/);
  const out: string[] = [];
  for (let i = 0; i < chunks.length; i += 2) {
    const body = (chunks[i] || '').trim();
    const punct = (chunks[i + 1] || '').trim();
    const sentence = `${body}${punct}`.trim();
    if (sentence) {
      out.push(sentence);
    }
  }
  if (out.length === 0 && text.trim()) {
    out.push(text.trim());
  }
  return out;
}

/**
 * Cuts `text` to at most `maxChars` on sentence boundaries. With `keepTail`
 * the newest sentences survive instead of the oldest.
 */
export function truncateBySentences(text: string, maxChars: number, keepTail = false): string {
  const normalized = normalize(text);
  if (!normalized) return '';
  if (normalized.length <= maxChars) return normalized;

  const sentences = splitSentences(normalized);
  const ordered = keepTail ? [...sentences].reverse() : sentences;
  const selected: string[] = [];
  let total = 0;

  for (const sentence of ordered) {
    const separator = selected.length > 0 ? 1 : 0;
    const next = total + separator + sentence.length;
    if (next > maxChars) break;
    selected.push(sentence);
    total = next;
  }

  if (selected.length === 0) {
    return keepTail ? normalized.slice(-maxChars) : normalized.slice(0, maxChars);
  }

  return (keepTail ? selected.reverse() : selected).join(' ');
}

export function clipText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  if (maxChars <= 3) return text.slice(0, maxChars);
  return `${text.slice(0, maxChars - 3).trimEnd()}...`;
}
