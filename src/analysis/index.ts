import { logger } from "../logger";
import type { DifficultyRules } from "../config";
import { classifyDifficulty, countWords } from "../difficulty";
import { findRole, matchRoleSkills, recommendMatch } from "../matching";
import { selectQuestionRecords } from "../questions";
import { rankByRelevance, type RankingOptions } from "../ranking";
import {
  describeSkills,
  extractSkills,
  type PartOfSpeechTagger,
  type SkillVocabulary,
} from "../skills";
import { QUESTION_CATEGORIES } from "../types";
import type {
  AnnotatedQuestion,
  JobRoleRecord,
  QuestionCategory,
  QuestionRecord,
  ResumeAnalysis,
} from "../types";

export { buildQuestionExport, exportFileName, EXPORT_HEADERS } from "./export";

export interface AnalysisContext {
  vocabulary: SkillVocabulary;
  roles: readonly JobRoleRecord[];
  questions: readonly QuestionRecord[];
  difficulty: DifficultyRules;
  ranking: RankingOptions & { topN: number };
  tagger?: PartOfSpeechTagger | null;
}

export interface AnalysisInput {
  resumeText: string;
  role: string;
  topN?: number;
  categories?: readonly QuestionCategory[];
}

export function annotateQuestions(
  resumeText: string,
  records: readonly QuestionRecord[],
  topN: number,
  context: Pick<AnalysisContext, "difficulty" | "ranking">,
): { questions: AnnotatedQuestion[]; degraded: boolean; reason?: string } {
  const outcome = rankByRelevance(resumeText, records, topN, {
    maxFeatures: context.ranking.maxFeatures,
    stopWords: context.ranking.stopWords,
    getText: (record) => record.text,
  });

  return {
    questions: outcome.ranked.map(({ item, similarity }) => ({
      category: item.category,
      text: item.text,
      difficulty: classifyDifficulty(item.text, context.difficulty),
      storedDifficulty: item.storedDifficulty,
      similarity,
    })),
    degraded: outcome.degraded,
    reason: outcome.reason,
  };
}

export function analyzeResume(
  input: AnalysisInput,
  context: AnalysisContext,
): ResumeAnalysis {
  const topN = input.topN ?? context.ranking.topN;
  const categories = input.categories ?? QUESTION_CATEGORIES;

  const skills = extractSkills(input.resumeText, context.vocabulary, {
    tagger: context.tagger,
  });

  const role = findRole(input.role, context.roles);
  if (!role) {
    logger.info(`Role "${input.role}" not in catalog — empty match report`);
  }
  const match = matchRoleSkills(role?.requiredSkills ?? [], skills);

  const questions: Record<QuestionCategory, AnnotatedQuestion[]> = {
    Technical: [],
    Behavioral: [],
    "Scenario-based": [],
  };
  const degradedRankings: QuestionCategory[] = [];

  for (const category of categories) {
    const records = selectQuestionRecords(input.role, category, context.questions);
    const result = annotateQuestions(input.resumeText, records, topN, context);
    questions[category] = result.questions;

    if (result.degraded) {
      degradedRankings.push(category);
      logger.warn(
        `Ranking ${category} questions for "${input.role}" fell back to catalog order: ${result.reason}`,
      );
    }
  }

  return {
    role: input.role,
    roleFound: role !== undefined,
    skills,
    skillBreakdown: describeSkills(skills, context.vocabulary),
    match,
    recommendation: recommendMatch(match.matchScore),
    questions,
    statistics: {
      characters: input.resumeText.length,
      words: countWords(input.resumeText),
      skills: skills.length,
    },
    degradedRankings,
  };
}
