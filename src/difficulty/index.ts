import type { DifficultyRules } from "../config";
import type { Difficulty } from "../types";

export interface KeywordCounts {
  hard: number;
  medium: number;
  easy: number;
}

// Each keyword counts once, however often it appears.
export function countKeywords(
  questionText: string,
  rules: DifficultyRules,
): KeywordCounts {
  const lower = questionText.toLowerCase();
  const count = (keywords: string[]) =>
    keywords.filter((kw) => lower.includes(kw.toLowerCase())).length;

  return {
    hard: count(rules.keywords.hard),
    medium: count(rules.keywords.medium),
    easy: count(rules.keywords.easy),
  };
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function classifyDifficulty(
  questionText: string,
  rules: DifficultyRules,
): Difficulty {
  const { hard, medium, easy } = countKeywords(questionText, rules);
  const words = countWords(questionText);
  const { hardKeywordMin, hardWordCount, mediumWordCount } = rules.thresholds;

  if (hard >= hardKeywordMin || words > hardWordCount) return "Hard";
  if (medium > easy || words > mediumWordCount) return "Medium";
  return "Easy";
}
