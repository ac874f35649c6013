export const QUESTION_CATEGORIES = [
  "Technical",
  "Behavioral",
  "Scenario-based",
] as const;

export type QuestionCategory = (typeof QUESTION_CATEGORIES)[number];

export type Difficulty = "Easy" | "Medium" | "Hard";

export type SkillKind = "Technical" | "Soft";

export type MatchLevel = "low" | "moderate" | "high";

export interface JobRoleRecord {
  roleName: string;
  requiredSkills: string[];
}

export interface QuestionRecord {
  roleName: string;
  category: QuestionCategory;
  text: string;
  storedDifficulty: string; // As found in the catalog, "Medium" when absent
}

export interface MatchReport {
  matchedSkills: string[];
  missingSkills: string[];
  matchScore: number; // 0-100, two decimals
}

export interface MatchRecommendation {
  level: MatchLevel;
  message: string;
}

export interface AnnotatedQuestion {
  category: QuestionCategory;
  text: string;
  difficulty: Difficulty;
  storedDifficulty: string;
  similarity: number | null; // null when ranking fell back to catalog order
}

export interface SkillBreakdownEntry {
  skill: string;
  kind: SkillKind;
}

export interface ResumeStatistics {
  characters: number;
  words: number;
  skills: number;
}

export interface ResumeAnalysis {
  role: string;
  roleFound: boolean;
  skills: string[];
  skillBreakdown: SkillBreakdownEntry[];
  match: MatchReport;
  recommendation: MatchRecommendation;
  questions: Record<QuestionCategory, AnnotatedQuestion[]>;
  statistics: ResumeStatistics;
  degradedRankings: QuestionCategory[];
}

export function isQuestionCategory(value: string): value is QuestionCategory {
  return QUESTION_CATEGORIES.some((category) => category === value);
}
