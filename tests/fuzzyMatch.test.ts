import { describe, it, expect } from "vitest";
import { gradeTypedAnswer, levenshtein, normalizeAnswerText } from "../src/lib/text/fuzzyMatch.js";

describe("normalizeAnswerText", () => {
  it("strips diacritics, case and extra whitespace", () => {
    expect(normalizeAnswerText("  Crème   Brûlée ")).toBe("creme brulee");
  });
});

describe("levenshtein", () => {
  it("counts edits", () => {
    expect(levenshtein("kitten", "sitting")).toBe(3);
    expect(levenshtein("", "abc")).toBe(3);
    expect(levenshtein("same", "same")).toBe(0);
  });
});

describe("gradeTypedAnswer", () => {
  it("accepts exact matches after normalisation", () => {
    expect(gradeTypedAnswer("SÃO PAULO", ["São Paulo"])).toBe("exact");
    expect(gradeTypedAnswer("azure", ["blue", "azure"])).toBe("exact");
  });

  it("treats up to two typos on longer answers as close", () => {
    expect(gradeTypedAnswer("recieve", ["receive"])).toBe("close");
    expect(gradeTypedAnswer("recive", ["receive"])).toBe("close");
    expect(gradeTypedAnswer("rcv", ["receive"])).toBe("wrong");
  });

  it("requires exact matches on short answers", () => {
    expect(gradeTypedAnswer("7", ["4"])).toBe("wrong");
    expect(gradeTypedAnswer("cat", ["bat"])).toBe("wrong");
  });

  it("rejects empty input", () => {
    expect(gradeTypedAnswer("   ", ["anything"])).toBe("wrong");
  });
});
