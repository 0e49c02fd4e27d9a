const VOWELS = "aeiou";

/**
 * Consonant/vowel classification used by the Porter measure.
 *
 * A character outside `aeiou` is a consonant, except `y` directly after a
 * consonant, which is a vowel. `leadingY` marks a word-initial `y` as a
 * consonant; without it a word-initial `y` counts as a vowel.
 */
export function consonantMask(word: string, leadingY: boolean): boolean[] {
  const mask: boolean[] = [];
  for (let i = 0; i < word.length; i += 1) {
    const ch = word[i];
    if (VOWELS.includes(ch)) {
      mask.push(false);
    } else if (ch !== "y") {
      mask.push(true);
    } else if (i === 0) {
      mask.push(leadingY);
    } else {
      mask.push(!mask[i - 1]);
    }
  }
  return mask;
}

/** Number of vowel-sequence → consonant-sequence transitions: [C](VC){m}[V]. */
export function measure(word: string, leadingY = false) {
  const mask = consonantMask(word, leadingY);
  let m = 0;
  for (let i = 1; i < mask.length; i += 1) {
    if (mask[i] && !mask[i - 1]) m += 1;
  }
  return m;
}

export function containsVowel(word: string, leadingY = false) {
  return consonantMask(word, leadingY).includes(false);
}

// doubled final character, excluding vowels, y, l, s and z
export function endsWithDoubleConsonant(word: string) {
  const n = word.length;
  if (n < 2) return false;
  const last = word[n - 1];
  return last === word[n - 2] && !"aeiouylsz".includes(last);
}

/**
 * The short-word shape: a consonant run, exactly one vowel, then one final
 * character outside `aeiouwxy` (e.g. "hop", "fil", "strap").
 */
export function isShortSyllable(word: string) {
  const n = word.length;
  if (n < 3) return false;
  if ("aeiouwxy".includes(word[n - 1])) return false;
  if (!"aeiouy".includes(word[n - 2])) return false;
  if (VOWELS.includes(word[0])) return false;
  for (let i = 1; i < n - 2; i += 1) {
    if ("aeiouy".includes(word[i])) return false;
  }
  return true;
}
