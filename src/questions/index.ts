import type { QuestionCategory, QuestionRecord } from "../types";
import { QUESTION_CATEGORIES } from "../types";

export function selectQuestionRecords(
  role: string,
  category: QuestionCategory,
  catalog: readonly QuestionRecord[],
): QuestionRecord[] {
  return catalog.filter(
    (question) => question.roleName === role && question.category === category,
  );
}

export function selectQuestions(
  role: string,
  category: QuestionCategory,
  catalog: readonly QuestionRecord[],
): string[] {
  return selectQuestionRecords(role, category, catalog).map((q) => q.text);
}

export function countQuestionsByCategory(
  role: string,
  catalog: readonly QuestionRecord[],
): Record<QuestionCategory, number> {
  const counts: Record<QuestionCategory, number> = {
    Technical: 0,
    Behavioral: 0,
    "Scenario-based": 0,
  };
  for (const question of catalog) {
    if (question.roleName === role) counts[question.category]++;
  }
  return counts;
}

export { QUESTION_CATEGORIES };
