/**
 * Text cleanup for generated dialogue
 *
 * Models like to wrap lines in markdown emphasis and quotes. None of that is
 * wanted in a spoken debate line, and the speech provider reads it aloud.
 */

// Markers must hug the text, so "5 * 3 * 2" keeps its stars
const EMPHASIS_PATTERNS: RegExp[] = [
  /\*\*(?=\S)(.+?)(?<=\S)\*\*/gs,
  /\b__(.+?)__\b/gs,
  /\*(?=\S)(.+?)(?<=\S)\*/gs,
  /\b_([^_]+?)_\b/gs,
];

const QUOTE_PATTERNS: RegExp[] = [
  /"([^"]*)"/g,
  /“([^”]*)”/g,
  /‘([^’]*)’/g,
];

// Single quotes only count at word edges so contractions survive
const SINGLE_QUOTED = /(^|\s)'([^'\n]+)'(?=$|\s|[.,!?;:])/g;

function cleanOnce(text: string): string {
  let result = text;

  for (const pattern of EMPHASIS_PATTERNS) {
    result = result.replace(pattern, '$1');
  }

  for (const pattern of QUOTE_PATTERNS) {
    result = result.replace(pattern, '$1');
  }

  return result
    .replace(SINGLE_QUOTED, '$1$2')
    .replace(/`/g, '')
    .replace(/[ \t]{2,}/g, ' ')
    .trim();
}

/**
 * Strip emphasis markers, wrapping quotes and backticks from a line.
 * Runs to a fixed point, so clean(clean(x)) === clean(x).
 *
 * @example
 * clean('**Hi** "there"') // 'Hi there'
 */
export function clean(text: string): string {
  let previous: string;
  let current = text;

  do {
    previous = current;
    current = cleanOnce(previous);
  } while (current !== previous);

  return current;
}
