import { z } from 'zod';

function stripCodeFence(text: string): string {
  return text.replace(/```json\s*|```\s*/gi, '').trim();
}

const ChapterPayloadSchema = z.object({
  title: z.string().default(''),
  content: z.string().min(1),
});

function tryParseJsonCandidate(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    try {
      // Best-effort fix for trailing commas.
      const fixed = candidate.replace(/,\s*([}\]])/g, '$1');
      return JSON.parse(fixed);
    } catch {
      return null;
    }
  }
}

/**
 * Some models answer with `{"title": ..., "content": ...}` despite being
 * asked for prose.
 */
function extractJsonPayload(raw: string): z.infer<typeof ChapterPayloadSchema> | null {
  const cleaned = stripCodeFence(raw);
  if (!cleaned.startsWith('{')) return null;
  const result = ChapterPayloadSchema.safeParse(tryParseJsonCandidate(cleaned));
  return result.success ? result.data : null;
}

const HEADING_PATTERN = /^(chapter|part)\s+[\divxlc]+\b/i;
const TITLE_LABEL_PATTERN = /^title\s*:\s*/i;

function normalizeTitle(title: string, chapterNumber: number): string {
  const cleaned = title.replace(/^#+\s*/, '').replace(TITLE_LABEL_PATTERN, '').trim();
  if (!cleaned) return `Chapter ${chapterNumber}`;
  if (HEADING_PATTERN.test(cleaned)) return cleaned;
  return `Chapter ${chapterNumber}: ${cleaned}`;
}

export type ChapterText = {
  /** Null when the text carries no heading */
  title: string | null;
  body: string;
};

/**
 * Splits a generated chapter into its heading and body. A heading is a
 * "Chapter ..."/"Part ..." or "Title: ..." line among the first four
 * non-empty lines.
 */
export function splitChapterText(raw: string, chapterNumber: number): ChapterText {
  const payload = extractJsonPayload(raw);
  if (payload) {
    return {
      title: payload.title.trim() ? normalizeTitle(payload.title, chapterNumber) : null,
      body: payload.content.trim(),
    };
  }

  const lines = stripCodeFence(raw).replace(/\r\n/g, '\n').split('\n');
  let seen = 0;
  for (let i = 0; i < lines.length && seen < 4; i++) {
    const line = lines[i].replace(/^#+\s*/, '').trim();
    if (!line) continue;
    seen++;
    if (HEADING_PATTERN.test(line) || TITLE_LABEL_PATTERN.test(line)) {
      return {
        title: normalizeTitle(line, chapterNumber),
        body: lines.slice(i + 1).join('\n').trim(),
      };
    }
  }
  return { title: null, body: lines.join('\n').trim() };
}

export function defaultChapterTitle(chapterNumber: number, arcTheme: string): string {
  return `Chapter ${chapterNumber}: ${arcTheme} Continues`;
}

export function countWords(text: string): number {
  const words = text.trim().split(/\s+/).filter(Boolean);
  return words.length;
}

/**
 * Known characters whose names appear in the text, in catalog order.
 */
export function findFeaturedCharacters(text: string, knownCharacters: readonly string[]): string[] {
  const lower = text.toLowerCase();
  return [...new Set(knownCharacters)].filter((name) => lower.includes(name.toLowerCase()));
}
