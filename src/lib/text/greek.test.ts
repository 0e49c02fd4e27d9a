import { normalizeGreek } from "@/lib/text/greek";

describe("normalizeGreek", () => {
  it("replaces whole Greek letter names with their codes", () => {
    expect(normalizeGreek("alpha")).toBe("a");
    expect(normalizeGreek("theta")).toBe("th");
    expect(normalizeGreek("omega")).toBe("o");
  });

  it("tests each letter run on its own", () => {
    expect(normalizeGreek("nf-kappa-b")).toBe("nf-k-b");
    expect(normalizeGreek("il-1beta")).toBe("il-1b");
    expect(normalizeGreek("alpha2")).toBe("a2");
    expect(normalizeGreek("2beta3gamma")).toBe("2b3g");
  });

  it("does not match a letter name inside a longer run", () => {
    expect(normalizeGreek("alphabeta")).toBe("alphabeta");
    expect(normalizeGreek("kappab")).toBe("kappab");
    expect(normalizeGreek("pie")).toBe("pie");
  });

  it("only reads lowercase letters", () => {
    expect(normalizeGreek("Alpha")).toBe("Alpha");
    expect(normalizeGreek("BETA")).toBe("BETA");
  });
});
