import { describe, expect, it } from "vitest";
import { makeQuestionContentHash } from "./normalize.js";

describe("makeQuestionContentHash", () => {
  it("produces identical hashes for equivalent question content", () => {
    const base = makeQuestionContentHash({
      question_text: "  What is 2 + 2?  ",
      correct_answers: ["4"],
      wrong_answers: ["3", "5"],
      tags: ["Math"],
    });

    const variant = makeQuestionContentHash({
      question_text: "what is 2 +   2?",
      correct_answers: [" 4 "],
      wrong_answers: ["5", "3"],
      tags: [" math "],
    });

    expect(variant).toBe(base);
  });

  it("changes when tags differ", () => {
    const math = makeQuestionContentHash({ question_text: "2 + 2?", correct_answers: ["4"], tags: ["math"] });
    const quiz = makeQuestionContentHash({ question_text: "2 + 2?", correct_answers: ["4"], tags: ["quiz"] });

    expect(quiz).not.toBe(math);
  });

  it("distinguishes the correct answer from the wrong ones", () => {
    const first = makeQuestionContentHash({ question_text: "Pick", correct_answers: ["a"], wrong_answers: ["b"] });
    const second = makeQuestionContentHash({ question_text: "Pick", correct_answers: ["b"], wrong_answers: ["a"] });

    expect(second).not.toBe(first);
  });
});
