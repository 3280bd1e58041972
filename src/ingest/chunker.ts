/**
 * Sentence-aware text chunker.
 *
 * Chunks hold whole sentences up to `chunkSize` characters. Consecutive
 * chunks share trailing sentences worth at most `chunkOverlap` characters.
 * A single sentence longer than `chunkSize` becomes a chunk of its own.
 */

import { DEFAULT_CHUNKING, type ChunkingOptions } from './types.js';

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=[A-Z0-9"'(])/;

export function splitSentences(text: string): string[] {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized === '') {
    return [];
  }
  return normalized.split(SENTENCE_BOUNDARY).filter((sentence) => sentence !== '');
}

export function chunkText(text: string, options: ChunkingOptions = DEFAULT_CHUNKING): string[] {
  const { chunkSize, chunkOverlap } = options;
  const sentences = splitSentences(text);
  const lengthAt = (i: number): number => sentences[i]?.length ?? 0;
  const chunks: string[] = [];

  let start = 0;
  while (start < sentences.length) {
    let end = start;
    let length = 0;

    while (end < sentences.length) {
      const added = lengthAt(end) + (end > start ? 1 : 0);
      if (end > start && length + added > chunkSize) break;
      length += added;
      end++;
    }

    chunks.push(sentences.slice(start, end).join(' '));
    if (end >= sentences.length) break;

    // Walk back from the end while the overlap fits; always advance by one
    let next = end;
    let overlap = 0;
    while (next > start + 1) {
      const added = lengthAt(next - 1) + (overlap > 0 ? 1 : 0);
      if (overlap + added > chunkOverlap) break;
      overlap += added;
      next--;
    }
    start = next;
  }

  return chunks;
}
