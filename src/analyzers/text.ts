const URL_PATTERN = /\bhttps?:\/\/\S+|\bwww\.\S+/gu;
const MENTION_PATTERN = /@[\p{L}\p{N}_]+/gu;
const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Splits text into lowercase letter/number runs. URLs and @mentions are
 * removed first; `#` and `$` prefixes fall away with the rest of the
 * punctuation.
 */
export function tokenize(text: string): string[] {
  const cleaned = text
    .normalize('NFKC')
    .toLowerCase()
    .replace(URL_PATTERN, ' ')
    .replace(MENTION_PATTERN, ' ');
  return cleaned.match(TOKEN_PATTERN) ?? [];
}

/** True when `phrase` occurs in `tokens` as a contiguous run. */
export function containsPhrase(tokens: readonly string[], phrase: readonly string[]): boolean {
  if (phrase.length === 0 || phrase.length > tokens.length) return false;

  outer: for (let start = 0; start <= tokens.length - phrase.length; start++) {
    for (let offset = 0; offset < phrase.length; offset++) {
      if (tokens[start + offset] !== phrase[offset]) continue outer;
    }
    return true;
  }
  return false;
}
