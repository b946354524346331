// Subtitle line wrapping: at most two lines per block.

export const DEFAULT_MAX_CHARS_PER_LINE = 65;

export type WrapStrategy = "balanced" | "greedy";

export interface WrapOptions {
  strategy?: WrapStrategy;
  maxCharsPerLine?: number;
  // Only used by the greedy strategy
  maxLines?: number;
}

export interface BalanceOptions {
  // Length difference tolerated without moving words
  threshold?: number;
  maxIterations?: number;
}

const splitWords = (text: string): string[] =>
  text.split(/\s+/u).filter((word) => word.length > 0);

const joinWords = (words: string[]): string => words.join(" ");

/**
 * Breaks `text` into two lines near its middle word, keeping both under
 * `maxCharsPerLine` where a word boundary allows it. The first line is
 * allowed to be shorter than the second.
 */
export function wrapBalanced(
  text: string,
  maxCharsPerLine: number = DEFAULT_MAX_CHARS_PER_LINE
): string {
  const words = splitWords(text);
  const normalized = joinWords(words);

  if (normalized.length <= maxCharsPerLine || words.length < 2) {
    return normalized;
  }

  const middle = Math.floor(words.length / 2);

  // Downward from the middle: first split where both lines fit
  for (let i = middle; i > 0; i--) {
    const firstLine = joinWords(words.slice(0, i));
    if (firstLine.length <= maxCharsPerLine) {
      const secondLine = joinWords(words.slice(i));
      if (secondLine.length <= maxCharsPerLine) {
        return `${firstLine}\n${secondLine}`;
      }
    }
  }

  // Upward: split one word before the first line would overflow
  for (let i = middle + 1; i < words.length; i++) {
    const firstLine = joinWords(words.slice(0, i));
    if (firstLine.length > maxCharsPerLine && i > 1) {
      return `${joinWords(words.slice(0, i - 1))}\n${joinWords(words.slice(i - 1))}`;
    }
  }

  return `${joinWords(words.slice(0, middle))}\n${joinWords(words.slice(middle))}`;
}

/**
 * Moves single words from the longer line to the shorter one while their
 * lengths differ by more than the threshold. A move that would lengthen the
 * longest line is not made.
 */
export function balanceTwoLines(
  line1: string,
  line2: string,
  options: BalanceOptions = {}
): [string, string] {
  const { threshold = 10, maxIterations = 3 } = options;
  let top = joinWords(splitWords(line1));
  let bottom = joinWords(splitWords(line2));

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const longest = Math.max(top.length, bottom.length);
    if (Math.abs(top.length - bottom.length) <= threshold) {
      break;
    }

    let nextTop: string;
    let nextBottom: string;

    if (top.length > bottom.length) {
      const parts = splitWords(top);
      if (parts.length <= 1) {
        break;
      }
      const moved = parts.pop();
      nextTop = joinWords(parts);
      nextBottom = bottom ? `${moved} ${bottom}` : `${moved}`;
    } else {
      const parts = splitWords(bottom);
      if (parts.length <= 1) {
        break;
      }
      const moved = parts.shift();
      nextBottom = joinWords(parts);
      nextTop = top ? `${top} ${moved}` : `${moved}`;
    }

    if (Math.max(nextTop.length, nextBottom.length) > longest) {
      break;
    }

    top = nextTop;
    bottom = nextBottom;
  }

  return [top, bottom];
}

/**
 * Greedy fill up to `maxLines`, overflow folded into the last line, then the
 * two lines are balanced. Text that fits is returned as one line.
 */
export function wrapGreedy(
  text: string,
  maxCharsPerLine: number = 60,
  maxLines: number = 2
): string {
  const words = splitWords(text);
  const normalized = joinWords(words);

  if (normalized.length <= maxCharsPerLine) {
    return normalized;
  }

  const lineLimit = Math.min(Math.max(1, Math.floor(maxLines)), 2);
  const lines: string[] = [];
  let currentWords: string[] = [];
  let currentLength = 0;

  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    const extraSpace = currentWords.length > 0 ? 1 : 0;

    if (
      currentWords.length === 0 ||
      currentLength + extraSpace + word.length <= maxCharsPerLine
    ) {
      currentWords.push(word);
      currentLength += extraSpace + word.length;
      continue;
    }

    lines.push(joinWords(currentWords));
    currentWords = [word];
    currentLength = word.length;

    if (lines.length >= lineLimit) {
      const rest = joinWords(words.slice(i));
      lines[lines.length - 1] = `${lines[lines.length - 1]} ${rest}`;
      currentWords = [];
      break;
    }
  }

  if (currentWords.length > 0) {
    lines.push(joinWords(currentWords));
  }

  if (lines.length === 1) {
    return lines[0];
  }

  // The normalised text is longer than one line here
  const [top, bottom] = balanceTwoLines(lines[0], lines[1]);
  return `${top}\n${bottom}`;
}

export function wrapSubtitleText(text: string, options: WrapOptions = {}): string {
  const {
    strategy = "balanced",
    maxCharsPerLine = DEFAULT_MAX_CHARS_PER_LINE,
    maxLines = 2,
  } = options;

  return strategy === "greedy"
    ? wrapGreedy(text, maxCharsPerLine, maxLines)
    : wrapBalanced(text, maxCharsPerLine);
}
