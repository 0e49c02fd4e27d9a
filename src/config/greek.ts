export const GREEK_LETTER_CODES: ReadonlyMap<string, string> = new Map([
  ["alpha", "a"],
  ["beta", "b"],
  ["gamma", "g"],
  ["delta", "d"],
  ["epsilon", "e"],
  ["zeta", "z"],
  ["eta", "e"],
  ["theta", "th"],
  ["iota", "i"],
  ["kappa", "k"],
  ["lambda", "l"],
  ["mu", "m"],
  ["nu", "n"],
  ["xi", "x"],
  ["omicron", "o"],
  ["pi", "p"],
  ["rho", "r"],
  ["sigma", "s"],
  ["tau", "t"],
  ["upsilon", "u"],
  ["phi", "ph"],
  ["chi", "ch"],
  ["psi", "ps"],
  ["omega", "o"],
]);
