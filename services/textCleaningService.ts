import { errorMessage, isExtractionError, isUpstreamErrorText } from '../errors';
import type { LLMProvider, TextCleaner } from '../types';
import { createAudioChunks, DEFAULT_MAX_CHUNK_SIZE, splitIntoChunks, splitIntoSentences } from '../utils/chunking';
import { mergeCleanedChunks } from '../utils/textMerge';
import { sleep as defaultSleep } from '../utils/workerPool';

export const DEFAULT_LLM_MAX_CHUNK_SIZE = 100_000;
const DEFAULT_OVERLAP_CHARS = 300;
const DEFAULT_REQUEST_DELAY_MS = 1_000;

export interface TextCleaningOptions {
  llmMaxChunkSize?: number;
  audioChunkSize?: number;
  overlapChars?: number; // trailing context repeated at the start of the next LLM request
  requestDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export const buildCleaningPrompt = (text: string): string => `
Your primary goal is to clean the following text from an academic document and prepare it to be read aloud by a text-to-speech engine.

Cleaning:
- Remove headers, footers, page numbers, running titles and journal names.
- Remove line numbers, marginalia, watermarks and scanning artifacts.
- Skip in-text citations such as [1] or (Author, 2023).
- Skip mathematical formulas and equations.
- Shorten URLs to their domain name.

Speech:
- Add natural pause markers using ellipses (...) where a speaker would pause.
- Before a major topic transition, add "... ... ..." for a longer pause.
- Read lists as "First... Second... Third..." instead of bullet points.
- Join words hyphenated across line breaks ("effec-\\ntive" becomes "effective").
- Keep paragraph breaks and produce grammatical, well-formed English.

Return only the cleaned text, with no commentary.

---
${text}
---
`;

/**
 * Cleanup without a language model: joins words hyphenated across lines,
 * collapses whitespace and marks paragraph breaks with a spoken pause.
 */
export const basicCleanup = (text: string): string =>
  text
    .replace(/\r\n?/g, '\n')
    .replace(/(\w)-\n\s*(\w)/g, '$1$2')
    .split(/\n\s*\n/)
    .map(paragraph => paragraph.replace(/\s+/g, ' ').trim())
    .filter(paragraph => paragraph.length > 0)
    .join('\n\n... ');

/**
 * Splits text into LLM-sized parts at sentence boundaries. Each part after the
 * first starts with the last sentences of the previous part (up to
 * `overlapChars`), so the model sees where the previous request stopped.
 */
export const splitForCleaning = (text: string, maxSize: number, overlapChars: number): string[] => {
  const parts = splitIntoChunks(text, maxSize);
  if (overlapChars <= 0) return parts;

  return parts.map((part, index) => {
    if (index === 0) return part;

    const tail: string[] = [];
    let length = 0;
    for (const sentence of splitIntoSentences(parts[index - 1]).reverse()) {
      if (length + sentence.length > overlapChars) break;
      tail.unshift(sentence);
      length += sentence.length + 1;
    }

    return tail.length > 0 ? `${tail.join(' ')} ${part}` : part;
  });
};

export class TextCleaningService implements TextCleaner {
  private readonly llmMaxChunkSize: number;
  private readonly audioChunkSize: number;
  private readonly overlapChars: number;
  private readonly requestDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly llm: LLMProvider | null,
    options: TextCleaningOptions = {},
  ) {
    this.llmMaxChunkSize = options.llmMaxChunkSize ?? DEFAULT_LLM_MAX_CHUNK_SIZE;
    this.audioChunkSize = options.audioChunkSize ?? DEFAULT_MAX_CHUNK_SIZE;
    this.overlapChars = options.overlapChars ?? DEFAULT_OVERLAP_CHARS;
    this.requestDelayMs = options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async cleanText(rawText: string): Promise<string[]> {
    if (!rawText.trim()) return [];

    if (isExtractionError(rawText) || isUpstreamErrorText(rawText)) {
      console.warn('[Cleaner] Skipping cleaning: upstream error');
      return [rawText];
    }

    if (!this.llm) {
      console.log('[Cleaner] No language model configured, using basic cleanup');
      return createAudioChunks([basicCleanup(rawText)], this.audioChunkSize);
    }

    const parts =
      rawText.length <= this.llmMaxChunkSize ? [rawText] : splitForCleaning(rawText, this.llmMaxChunkSize, this.overlapChars);
    if (parts.length > 1) {
      console.log(`[Cleaner] Large text (${rawText.length} chars), cleaning in ${parts.length} parts`);
    }

    const cleaned: string[] = [];
    for (const [index, part] of parts.entries()) {
      if (index > 0 && this.requestDelayMs > 0) await this.sleep(this.requestDelayMs);

      try {
        const result = (await this.llm.generateContent(buildCleaningPrompt(part))).trim();
        if (!result) throw new Error('language model returned no text');
        cleaned.push(result);
      } catch (error) {
        console.error(`[Cleaner] Part ${index + 1}/${parts.length} failed with ${this.llm.name}:`, errorMessage(error));
        cleaned.push(basicCleanup(part));
      }
    }

    const merged = mergeCleanedChunks(cleaned, { maxOverlapChars: this.overlapChars * 2 });
    return createAudioChunks([merged], this.audioChunkSize);
  }
}
