import { GREEK_LETTER_CODES } from "@/config/greek";

const LETTER_RUN = /[a-z]+/g;

/**
 * Replaces every lowercase letter run that is exactly a Greek letter name
 * ("alpha", "kappa", ...) with its short code. Runs are matched whole:
 * "alpha-2" becomes "a-2" but "alphabeta" stays as it is.
 */
export function normalizeGreek(subtoken: string) {
  return subtoken.replace(LETTER_RUN, (run) => GREEK_LETTER_CODES.get(run) ?? run);
}
