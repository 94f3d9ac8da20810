// Characters per TTS request.
export const DEFAULT_MAX_CHUNK_SIZE = 3000;

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

// Stand-in for abbreviation periods while splitting (Unicode private use area).
const MASK = '\uE000';
const TITLE_ABBREVIATIONS = /\b(Dr|Mr|Mrs|Ms|Prof|Sr|Jr|St|vs)\./g;
const LATIN_ABBREVIATIONS = /\b(?:e\.g|i\.e)\./gi;

const maskAbbreviations = (text: string): string =>
  text
    .replace(TITLE_ABBREVIATIONS, `$1${MASK}`)
    .replace(LATIN_ABBREVIATIONS, match => match.split('.').join(MASK));

const unmask = (text: string): string => text.split(MASK).join('.');

const hasWords = (text: string): boolean => /[\p{L}\p{N}]/u.test(text);

// Pause markers such as "... ... ..." carry no words; they stay with the sentence before them.
const attachWordless = (sentences: readonly string[]): string[] => {
  const merged: string[] = [];
  let pending = '';

  for (const sentence of sentences) {
    if (hasWords(sentence)) {
      merged.push(pending ? `${pending} ${sentence}` : sentence);
      pending = '';
    } else if (merged.length > 0) {
      merged[merged.length - 1] = `${merged[merged.length - 1]} ${sentence}`;
    } else {
      pending = pending ? `${pending} ${sentence}` : sentence;
    }
  }

  if (pending) merged.push(pending);
  return merged;
};

/**
 * Splits text into sentences on terminal punctuation followed by whitespace.
 * Titles such as "Dr." or "Prof." never end a sentence, and fragments
 * without a letter or digit are folded into a neighbouring sentence.
 */
export const splitIntoSentences = (text: string): string[] => {
  if (!text.trim()) return [];

  return attachWordless(
    maskAbbreviations(text)
      .split(SENTENCE_BOUNDARY)
      .map(sentence => unmask(sentence).trim())
      .filter(sentence => sentence.length > 0),
  );
};

const packWords = (sentence: string, maxChunkSize: number): string[] => {
  const chunks: string[] = [];
  let current = '';

  for (const word of sentence.split(/\s+/).filter(Boolean)) {
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxChunkSize && current) {
      chunks.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) chunks.push(current);
  return chunks;
};

/**
 * Greedily packs whole sentences into chunks of at most `maxChunkSize`
 * characters. A sentence that is longer than the limit on its own is packed
 * word by word instead; a single oversized word is kept intact.
 */
export const splitIntoChunks = (text: string, maxChunkSize: number = DEFAULT_MAX_CHUNK_SIZE): string[] => {
  const trimmed = text.trim();
  if (!trimmed) return [];
  if (trimmed.length <= maxChunkSize) return [trimmed];

  const chunks: string[] = [];
  let current = '';

  for (const sentence of splitIntoSentences(trimmed)) {
    if (sentence.length > maxChunkSize) {
      if (current) {
        chunks.push(current);
        current = '';
      }
      chunks.push(...packWords(sentence, maxChunkSize));
      continue;
    }

    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length > maxChunkSize) {
      chunks.push(current);
      current = sentence;
    } else {
      current = candidate;
    }
  }

  if (current) chunks.push(current);
  return chunks;
};

/**
 * Re-chunks a list of cleaned texts so that no element exceeds the limit,
 * keeping their order.
 */
export const createAudioChunks = (texts: readonly string[], maxChunkSize: number): string[] =>
  texts.flatMap(text => splitIntoChunks(text, maxChunkSize));
