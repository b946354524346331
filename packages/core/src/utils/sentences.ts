import type { Sentence } from "../types/subtitle";
import type { Segmenter } from "../types/translation";

// Abbreviations that end in a period without closing the sentence
const specialWords = new Set([
  "mr.",
  "mrs.",
  "ms.",
  "dr.",
  "prof.",
  "st.",
  "sr.",
  "jr.",
  "vs.",
  "etc.",
  "e.g.",
  "i.e.",
  "approx.",
  "no.",
]);

const CLOSING_PUNCTUATION = /["'”’»)\]]+$/u;
const SENTENCE_END = /([.?!…])$/u;
const SINGLE_INITIAL = /^\p{Lu}\.$/u;
const STARTS_LOWERCASE = /^["'“‘«(\[]*\p{Ll}/u;

// Conjunctions a clause is allowed to start with
const CLAUSE_CONJUNCTIONS = [
  "and",
  "or",
  "but",
  "so",
  "therefore",
  "because",
  "who",
  "what",
  "how",
  "which",
  "when",
  "where",
  "while",
  "although",
  "if",
  "though",
  "as",
  "until",
  "unless",
];

const CLAUSE_PUNCTUATION_BREAK = /(?<=[,;:])\s+/u;
const CLAUSE_CONJUNCTION_BREAK = new RegExp(
  `\\s+(?=(?:${CLAUSE_CONJUNCTIONS.join("|")})\\b)`,
  "iu"
);

// A lone capital only reads as an initial inside a chain ("J. R. Tolkien")
const isInitial = (word: string, nextWord?: string, previousWord?: string) =>
  SINGLE_INITIAL.test(word) &&
  ((nextWord !== undefined && SINGLE_INITIAL.test(nextWord)) ||
    (previousWord !== undefined && SINGLE_INITIAL.test(previousWord)));

/**
 * Whether `word` closes a sentence. `nextWord` is used to reject breaks
 * before a lowercase continuation ("Wait... what"); both neighbours decide
 * whether a lone capital ("B.") is an initial or ends the sentence.
 */
export function isEndOfSentence(
  word: string,
  nextWord?: string,
  previousWord?: string
): boolean {
  const bare = word.replace(CLOSING_PUNCTUATION, "");
  if (!SENTENCE_END.test(bare)) {
    return false;
  }
  if (specialWords.has(bare.toLowerCase()) || isInitial(bare, nextWord, previousWord)) {
    return false;
  }
  if (nextWord !== undefined && STARTS_LOWERCASE.test(nextWord)) {
    return false;
  }
  return true;
}

export const segmentSentences: Segmenter = (text) => {
  const words = text.split(/\s+/u).filter((word) => word.length > 0);
  const sentences: Sentence[] = [];
  let currentWords: string[] = [];

  const flush = () => {
    if (currentWords.length > 0) {
      sentences.push(currentWords.join(" "));
    }
    currentWords = [];
  };

  words.forEach((word, index) => {
    currentWords.push(word);
    if (isEndOfSentence(word, words[index + 1], words[index - 1])) {
      flush();
    }
  });

  flush();
  return sentences;
};

export const splitIntoClauses = (sentence: Sentence): Sentence[] => {
  return sentence
    .split(CLAUSE_PUNCTUATION_BREAK)
    .flatMap((part) => part.split(CLAUSE_CONJUNCTION_BREAK))
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
};

// Finer-grained drop-in for `segmentSentences`
export const segmentClauses: Segmenter = (text) =>
  segmentSentences(text).flatMap(splitIntoClauses);

export type SegmenterKind = "sentence" | "clause";

export const createSegmenter = (kind: SegmenterKind = "sentence"): Segmenter =>
  kind === "clause" ? segmentClauses : segmentSentences;
