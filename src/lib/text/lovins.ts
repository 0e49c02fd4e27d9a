import endingTable from "@/config/lovins-endings.json";
import type { LovinsCondition } from "@/lib/types";

type Condition = (prefix: string) => boolean;

// Lovins (1968) context conditions, evaluated against the retained stem.
const CONDITIONS: Record<LovinsCondition, Condition> = {
  A: () => true,
  B: (p) => p.length >= 3,
  C: (p) => p.length >= 4,
  D: (p) => p.length >= 5,
  E: (p) => !p.endsWith("e"),
  F: (p) => p.length >= 3 && !p.endsWith("e"),
  G: (p) => p.length >= 3 && p.endsWith("f"),
  H: (p) => /(t|ll)$/.test(p),
  I: (p) => !/[oe]$/.test(p),
  J: (p) => !/[ae]$/.test(p),
  K: (p) => p.length >= 3 && /(l|i|u.e)$/.test(p),
  L: (p) => !/(u|x|[^o]s)$/.test(p),
  M: (p) => !/[aecm]$/.test(p),
  N: (p) => /([^s]..|.s..)$/.test(p),
  O: (p) => /[li]$/.test(p),
  P: (p) => !p.endsWith("c"),
  Q: (p) => p.length >= 3 && !/[ln]$/.test(p),
  R: (p) => /[nr]$/.test(p),
  S: (p) => /(dr|[^t]t)$/.test(p),
  T: (p) => /(s|[^o]t)$/.test(p),
  U: (p) => /[lmnr]$/.test(p),
  V: (p) => p.endsWith("c"),
  W: (p) => !/[su]$/.test(p),
  X: (p) => /(l|i|u.e)$/.test(p),
  Y: (p) => p.endsWith("in"),
  Z: (p) => !p.endsWith("f"),
  AA: (p) => /(d|f|ph|th|l|er|or|es|t)$/.test(p),
  BB: (p) => p.length >= 3 && !/(met|ryst)$/.test(p),
  CC: (p) => p.endsWith("l"),
};

export const LOVINS_CONDITIONS: Readonly<Record<LovinsCondition, Condition>> = Object.freeze(CONDITIONS);

function isCondition(code: string): code is LovinsCondition {
  return Object.prototype.hasOwnProperty.call(LOVINS_CONDITIONS, code);
}

function loadEndings(table: Record<string, string>) {
  const endings = new Map<string, LovinsCondition>();
  for (const [ending, code] of Object.entries(table)) {
    if (!isCondition(code)) {
      throw new Error(`Unknown Lovins condition "${code}" for ending "${ending}"`);
    }
    endings.set(ending, code);
  }
  return endings;
}

export const LOVINS_ENDINGS: ReadonlyMap<string, LovinsCondition> = loadEndings(endingTable);

const LONGEST_ENDING = 11;

type Respelling = [RegExp, string];

// Every rule of the matching list runs, in order, on the running result.
const RESPELLINGS: Readonly<Record<string, readonly Respelling[]>> = {
  t: [
    [/tt$/, "t"],
    [/uct$/, "uc"],
    [/umpt$/, "um"],
    [/rpt$/, "rb"],
    [/mit$/, "mis"],
    [/ert$/, "ers"],
    [/^et$/, "es"],
    [/([^n])et$/, "$1es"],
    [/yt$/, "ys"],
  ],
  r: [
    [/rr$/, "r"],
    [/istr$/, "ister"],
    [/metr$/, "meter"],
    [/^her$/, "hes"],
    [/([^pt])her$/, "$1hes"],
  ],
  d: [
    [/dd$/, "d"],
    [/uad$/, "uas"],
    [/vad$/, "vas"],
    [/cid$/, "cis"],
    [/lid$/, "lis"],
    [/erid$/, "eris"],
    [/pand$/, "pans"],
    [/^end$/, "ens"],
    [/([^s])end$/, "$1ens"],
    [/ond$/, "ons"],
    [/lud$/, "lus"],
    [/rud$/, "rus"],
    [/^end$/, "ens"],
    [/([^m])end$/, "$1ens"],
  ],
  n: [[/nn$/, "n"]],
  l: [
    [/ll$/, "l"],
    [/([^aio])ul$/, "$1l"],
  ],
  m: [[/mm$/, "m"]],
  s: [
    [/ss$/, "s"],
    [/urs$/, "ur"],
  ],
  g: [[/gg$/, "g"]],
  v: [
    [/iev$/, "ief"],
    [/olv$/, "olut"],
  ],
  p: [[/pp$/, "p"]],
  b: [[/bb$/, "b"]],
  x: [
    [/bex$/, "bic"],
    [/dex$/, "dic"],
    [/pex$/, "pic"],
    [/tex$/, "tic"],
    [/ax$/, "ac"],
    [/ex$/, "ec"],
    [/ix$/, "ic"],
    [/lux$/, "luc"],
  ],
  z: [[/yz$/, "ys"]],
};

function removeEnding(word: string) {
  const start = word.length <= LONGEST_ENDING + 2 ? 2 : word.length - LONGEST_ENDING;
  for (let cut = start; cut < word.length; cut += 1) {
    const code = LOVINS_ENDINGS.get(word.slice(cut));
    const prefix = word.slice(0, cut);
    if (code && LOVINS_CONDITIONS[code](prefix)) return prefix;
  }
  return word;
}

export function respell(stem: string) {
  const rules = RESPELLINGS[stem.slice(-1)] ?? [];
  return rules.reduce((current, [pattern, replacement]) => current.replace(pattern, replacement), stem);
}

/**
 * Lovins stemmer: removes the longest listed ending whose condition holds on
 * the remaining stem (keeping at least two characters), then recodes the
 * stem's final letters. Words of two characters or fewer are unchanged.
 */
export function lovinsStem(word: string): string {
  if (word.length <= 2) return word;
  return respell(removeEnding(word));
}
