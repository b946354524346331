export interface SubtitleBlock {
  // Advisory; may be renumbered when written back
  index: number;
  // Kept verbatim, e.g. "00:00:01,000 --> 00:00:03,000"
  timeRange: string;
  text: string;
}

export type Sentence = string;

export type ProtectedVocabulary = readonly string[];
