/**
 * Hyphen characters joining a word across a line break, following the
 * OCR-D transcription guidelines.
 */
const HYPHENS: readonly string[] = ['-', '⹀', '⸗'];

// '-' leads the class, so it is read literally
const TRAILING_HYPHENS = new RegExp(`[${HYPHENS.join('')}]+$`, 'u');

function startsUppercase(word: string): boolean {
  const first = word.charAt(0);
  return first !== first.toLowerCase() && first === first.toUpperCase();
}

/**
 * Join lines broken by a hyphen. A line ending in a hyphen loses the hyphen
 * and takes the next line unless that line's first word starts with an
 * uppercase letter; a joined line is checked again against the following one.
 */
export function dehyphenate(lines: string[]): string[] {
  const result: string[] = [];
  let current: string | undefined;

  for (const raw of lines) {
    const line = raw.trim();
    if (line.length === 0) {
      continue;
    }
    if (current === undefined) {
      current = line;
    } else if (TRAILING_HYPHENS.test(current) && !startsUppercase(line)) {
      current = current.replace(TRAILING_HYPHENS, '') + line;
    } else {
      result.push(current);
      current = line;
    }
  }
  if (current !== undefined) {
    result.push(current);
  }
  return result;
}
