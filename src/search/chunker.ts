export const MIN_CHUNK_LENGTH = 50;
const FALLBACK_LENGTH = 2000;

const QUOTE_MARKERS: readonly RegExp[] = [
  /^On .+ wrote:?\s*$/im,
  /(^>.*\n){3,}/m,
  /^Sent from my (iPhone|Android|iPad|Galaxy).*$/im,
  /^_{3,}\s*$/m,
  /^-{3,}\s*Original Message\s*-{3,}/im,
];

/**
 * Keeps the new part of a reply: everything before the first quote marker.
 * Falls back to paragraph-wise trimming, then to the head of the original,
 * when stripping leaves almost nothing.
 */
export function stripQuotedReplies(text: string): string {
  if (!text) return "";

  let earliest = text.length;
  for (const marker of QUOTE_MARKERS) {
    const match = marker.exec(text);
    if (match && match.index < earliest) earliest = match.index;
  }
  let clean = text.slice(0, earliest).trim();

  if (clean.length < MIN_CHUNK_LENGTH && text.length > MIN_CHUNK_LENGTH) {
    const kept: string[] = [];
    for (const part of text.split("\n\n")) {
      const trimmed = part.trim();
      if (QUOTE_MARKERS.some((m) => m.exec(trimmed)?.index === 0)) break;
      kept.push(part);
    }
    clean = kept.join("\n\n").trim();
  }

  if (clean.length < MIN_CHUNK_LENGTH && text.length > MIN_CHUNK_LENGTH) {
    clean = text.slice(0, FALLBACK_LENGTH).trim();
  }
  return clean;
}

function splitPoint(slice: string, maxLength: number): number {
  const floor = maxLength * 0.5;

  // Paragraph boundary
  const paraIdx = slice.lastIndexOf("\n\n");
  if (paraIdx > floor) return paraIdx;

  // Sentence boundary
  const sentenceEnds = [...slice.matchAll(/[.!?](?=\s)/g)];
  const last = sentenceEnds[sentenceEnds.length - 1];
  if (last?.index !== undefined && last.index > floor) return last.index + 1;

  const newlineIdx = slice.lastIndexOf("\n");
  if (newlineIdx > floor) return newlineIdx + 1;

  const spaceIdx = slice.lastIndexOf(" ");
  if (spaceIdx > floor) return spaceIdx + 1;

  return maxLength;
}

/** Splits text into overlapping chunks of at most `size` characters. */
export function chunkDocument(text: string, size: number, overlap: number): string[] {
  if (!text.trim()) return [];
  if (text.length <= size) return [text.trim()];

  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + size, text.length);
    if (end < text.length) {
      end = start + splitPoint(text.slice(start, end), size);
    }
    const chunk = text.slice(start, end).trim();
    if (chunk) chunks.push(chunk);
    if (end >= text.length) break;
    start = Math.max(end - overlap, start + 1);
  }
  return chunks;
}

export function chunkId(sourceType: "item" | "attachment", sourceId: string, index: number): string {
  return `${sourceType}:${sourceId}:${index}`;
}
