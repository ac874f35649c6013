import { toCsv } from "../catalog/csv";
import { QUESTION_CATEGORIES } from "../types";
import type { QuestionCategory, ResumeAnalysis } from "../types";

export const EXPORT_HEADERS = ["Category", "Question", "Difficulty", "Job Role"];

const CATEGORY_LABELS: Record<QuestionCategory, string> = {
  Technical: "Technical Questions",
  Behavioral: "Behavioral Questions",
  "Scenario-based": "Scenario-based Questions",
};

export function buildQuestionExport(
  analysis: Pick<ResumeAnalysis, "role" | "questions">,
): string {
  const rows = QUESTION_CATEGORIES.flatMap((category) =>
    analysis.questions[category].map((question) => [
      CATEGORY_LABELS[category],
      question.text,
      question.difficulty,
      analysis.role,
    ]),
  );
  return toCsv(EXPORT_HEADERS, rows);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** interview_questions_<role>_<YYYYMMDD_HHMMSS>.csv, local time. */
export function exportFileName(role: string, at: Date = new Date()): string {
  const stamp =
    `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}_` +
    `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  const safeRole = role.replace(/[\\/:*?"<>|]+/g, "-");
  return `interview_questions_${safeRole}_${stamp}.csv`;
}
