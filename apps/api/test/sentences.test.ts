import { describe, it, expect } from "vitest";
import { buildContextualSentences, buildExcerpt, splitSentences } from "../src/agents/sentences";

describe("splitSentences", () => {
  it("splits on terminal punctuation followed by a capital", () => {
    expect(splitSentences("Paris is the capital of France. It has a population of 50 million.")).toEqual([
      "Paris is the capital of France.",
      "It has a population of 50 million."
    ]);
  });

  it("returns nothing for empty or blank text", () => {
    expect(splitSentences("")).toEqual([]);
    expect(splitSentences("   \n  \r\n ")).toEqual([]);
  });

  it("does not split after abbreviations or initials", () => {
    expect(splitSentences("Dr. Smith arrived. He left.")).toEqual(["Dr. Smith arrived.", "He left."]);
    expect(splitSentences("J. K. Rowling wrote it. Fans loved it.")).toEqual([
      "J. K. Rowling wrote it.",
      "Fans loved it."
    ]);
    expect(splitSentences("The U.S. economy grew. Then it fell.")).toEqual(["The U.S. economy grew.", "Then it fell."]);
  });

  it("keeps a numbered list marker with its item", () => {
    expect(splitSentences("1. Paris is the capital of France.\n2. It has 2 million people.")).toEqual([
      "1. Paris is the capital of France.",
      "2. It has 2 million people."
    ]);
    expect(splitSentences("3. First point. Second point.")).toEqual(["3. First point.", "Second point."]);
  });

  it("reads No. as an abbreviation only before a number", () => {
    expect(splitSentences("Is Berlin the capital of France? The answer is no. Paris is the capital.")).toEqual([
      "Is Berlin the capital of France?",
      "The answer is no.",
      "Paris is the capital."
    ]);
    expect(splitSentences("He wore No. 5 at the club. It was retired.")).toEqual([
      "He wore No. 5 at the club.",
      "It was retired."
    ]);
  });

  it("splits after a company name ending in Co", () => {
    expect(splitSentences("She joined the Acme Co. Sales doubled.")).toEqual(["She joined the Acme Co.", "Sales doubled."]);
  });

  it("keeps decimals and lowercase continuations together", () => {
    expect(splitSentences("Pi is 3.14 exactly. Yes.")).toEqual(["Pi is 3.14 exactly.", "Yes."]);
    expect(splitSentences("Wait... what happened? Nothing!")).toEqual(["Wait... what happened?", "Nothing!"]);
  });

  it("keeps closing quotes with their sentence", () => {
    expect(splitSentences('He said "Stop." Then he left.')).toEqual(['He said "Stop."', "Then he left."]);
  });

  it("treats every line as its own unit", () => {
    expect(splitSentences("- First item\n- Second item\r\nLast line")).toEqual([
      "- First item",
      "- Second item",
      "Last line"
    ]);
  });
});

describe("buildExcerpt", () => {
  const sentences = ["A.", "B.", "C.", "D."];

  it("marks truncation on both sides", () => {
    expect(buildExcerpt(sentences, 2, { before: 1, after: 0 })).toBe("[...] B. C. [...]");
  });

  it("shows the whole text when the window covers it", () => {
    expect(buildExcerpt(sentences, 0, { before: 5, after: 5 })).toBe("A. B. C. D.");
  });

  it("marks only the side that was cut", () => {
    expect(buildExcerpt(sentences, 0, { before: 5, after: 1 })).toBe("A. B. [...]");
    expect(buildExcerpt(sentences, 3, { before: 1, after: 5 })).toBe("[...] C. D.");
  });
});

describe("buildContextualSentences", () => {
  it("numbers sentences from zero and prefixes the question", () => {
    expect(buildContextualSentences("Q?", "A one. B two.", { before: 5, after: 5 })).toEqual([
      {
        original_sentence: "A one.",
        context_for_llm: "Question: Q?\nExcerpt: A one. B two.",
        question: "Q?",
        original_index: 0
      },
      {
        original_sentence: "B two.",
        context_for_llm: "Question: Q?\nExcerpt: A one. B two.",
        question: "Q?",
        original_index: 1
      }
    ]);
  });

  it("is pure: the same input gives the same sentences", () => {
    const answer = "One fact. Two facts.\nThree facts.";
    const a = buildContextualSentences("Q", answer, { before: 1, after: 1 });
    const b = buildContextualSentences("Q", answer, { before: 1, after: 1 });
    expect(a).toEqual(b);
    expect(a.map((s) => s.original_index)).toEqual([0, 1, 2]);
  });
});
