export interface MergeOptions {
  maxOverlapChars?: number; // upper bound on the repeated prefix of the next chunk
  minOverlapWords?: number; // shorter matches are treated as coincidence
}

const DEFAULT_MAX_OVERLAP_CHARS = 1000;
const DEFAULT_MIN_OVERLAP_WORDS = 3;

interface WordSpan {
  word: string;
  end: number;
}

const normalizeWord = (word: string): string => word.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');

const wordSpans = (text: string): WordSpan[] =>
  Array.from(text.matchAll(/\S+/g), match => ({
    word: normalizeWord(match[0]),
    end: (match.index ?? 0) + match[0].length,
  }));

/**
 * Number of leading characters of `next` that repeat the tail of `previous`,
 * matched on whole words. Returns 0 when no overlap is found.
 */
export const findOverlap = (previous: string, next: string, options: MergeOptions = {}): number => {
  const maxChars = options.maxOverlapChars ?? DEFAULT_MAX_OVERLAP_CHARS;
  const minWords = options.minOverlapWords ?? DEFAULT_MIN_OVERLAP_WORDS;

  const tail = (previous.match(/\S+/g) ?? []).map(normalizeWord);
  const head = wordSpans(next).filter(span => span.end <= maxChars);
  const limit = Math.min(tail.length, head.length);

  for (let size = limit; size >= minWords; size--) {
    let matches = true;
    for (let i = 0; i < size; i++) {
      if (tail[tail.length - size + i] !== head[i].word) {
        matches = false;
        break;
      }
    }
    if (matches) return head[size - 1].end;
  }

  return 0;
};

export const mergeChunkPair = (previous: string, next: string, options: MergeOptions = {}): string => {
  const left = previous.trim();
  const right = next.trim();
  if (!left) return right;
  if (!right) return left;

  const overlap = findOverlap(left, right, options);
  if (overlap === 0) return `${left}\n\n${right}`;

  const remainder = right.slice(overlap).trim();
  return remainder ? `${left} ${remainder}` : left;
};

/**
 * Reassembles consecutively cleaned parts of one document into a single
 * narrative, dropping text that the next part repeats from the previous one.
 */
export const mergeCleanedChunks = (chunks: readonly string[], options: MergeOptions = {}): string =>
  chunks.reduce((merged, chunk) => mergeChunkPair(merged, chunk, options), '');
