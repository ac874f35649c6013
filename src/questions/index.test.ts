import { describe, expect, it } from "vitest";
import type { QuestionRecord } from "../types";
import { countQuestionsByCategory, selectQuestionRecords, selectQuestions } from "./index";

const catalog: QuestionRecord[] = [
  { roleName: "Backend Developer", category: "Technical", text: "What is REST?", storedDifficulty: "Easy" },
  { roleName: "Backend Developer", category: "Behavioral", text: "Tell me about a conflict.", storedDifficulty: "Medium" },
  { roleName: "Frontend Developer", category: "Technical", text: "What is the DOM?", storedDifficulty: "Easy" },
  { roleName: "Backend Developer", category: "Technical", text: "Explain indexing.", storedDifficulty: "Medium" },
];

describe("selectQuestions", () => {
  it("keeps catalog order for the role and category", () => {
    expect(selectQuestions("Backend Developer", "Technical", catalog)).toEqual([
      "What is REST?",
      "Explain indexing.",
    ]);
  });

  it("compares role names exactly", () => {
    expect(selectQuestions("backend developer", "Technical", catalog)).toEqual([]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(selectQuestions("Backend Developer", "Scenario-based", catalog)).toEqual([]);
    expect(selectQuestions("Backend Developer", "Technical", [])).toEqual([]);
  });

  it("can return the records themselves", () => {
    expect(
      selectQuestionRecords("Backend Developer", "Behavioral", catalog).map(
        (q) => q.storedDifficulty,
      ),
    ).toEqual(["Medium"]);
  });
});

describe("countQuestionsByCategory", () => {
  it("counts every category for a role", () => {
    expect(countQuestionsByCategory("Backend Developer", catalog)).toEqual({
      Technical: 2,
      Behavioral: 1,
      "Scenario-based": 0,
    });
  });
});
