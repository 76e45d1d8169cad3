export const SENTENCE_SPLIT_STRATEGY = 'sentence_split_simple';

// A break follows '.', '!' or '?' when whitespace comes next. Abbreviations
// and decimals are not special-cased.
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Groups consecutive sentences into chunks of `sentencesPerChunk`, without
 * overlap. The last chunk may hold fewer sentences.
 *
 * The result is lazy: nothing is split until it is iterated, and every
 * iteration starts again from the beginning of the text.
 */
export function splitTextBySentences(text: string, sentencesPerChunk: number = 3): Iterable<string> {
  if (!Number.isInteger(sentencesPerChunk) || sentencesPerChunk <= 0) {
    throw new RangeError(`sentencesPerChunk must be a positive integer, got ${sentencesPerChunk}`);
  }

  return {
    *[Symbol.iterator]() {
      const sentences = splitSentences(text);
      for (let i = 0; i < sentences.length; i += sentencesPerChunk) {
        yield sentences.slice(i, i + sentencesPerChunk).join(' ');
      }
    },
  };
}
