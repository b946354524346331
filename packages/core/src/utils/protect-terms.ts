import type { ProtectedVocabulary } from "../types/subtitle";

export const PROTECTION_MARKER = "§";

// Longest / most specific first
export const DEFAULT_PROTECTED_TERMS: ProtectedVocabulary = [
  "Zero to Mastery",
  "React Native",
  "Objective-C",
  "History API",
  "JavaScript",
  "TypeScript",
  "Kubernetes",
  "C-sharp",
  "Angular",
  "Node.js",
  "GitHub",
  "Docker",
  "Python",
  "Azure",
  "React",
  "Java",
  "C++",
  "AWS",
  "Git",
  "SQL",
  "Vue",
  "C#",
];

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Sorts a term list longest-first so that a longer term always wins over a
 * shorter one it contains. Stable for equal lengths; drops blanks and duplicates.
 */
export const orderVocabulary = (terms: Iterable<string>): string[] => {
  const unique = [...new Set(terms)].filter((term) => term.length > 0);
  return unique
    .map((term, position) => ({ term, position }))
    .sort((a, b) => b.term.length - a.term.length || a.position - b.position)
    .map(({ term }) => term);
};

/**
 * Wraps every literal occurrence of a vocabulary term in marker characters.
 * Terms are tried in the given order at each position in a single pass, so a
 * term already wrapped is never matched again.
 */
export function protectTerms(
  text: string,
  vocabulary: ProtectedVocabulary,
  marker: string = PROTECTION_MARKER
): string {
  const terms = vocabulary.filter((term) => term.length > 0);
  if (!text || terms.length === 0) {
    return text;
  }

  const pattern = new RegExp(terms.map(escapeRegExp).join("|"), "g");
  return text.replace(pattern, (term) => `${marker}${term}${marker}`);
}

export function unprotectTerms(
  text: string,
  marker: string = PROTECTION_MARKER
): string {
  return text.split(marker).join("");
}
