import type { AppConfig } from "./config";
import { CatalogCache } from "./catalog";
import { analyzeResume, type AnalysisContext, type AnalysisInput } from "./analysis";
import {
  buildVocabulary,
  createBrillTagger,
  extractSkills,
  type PartOfSpeechTagger,
  type SkillVocabulary,
} from "./skills";
import type { JobRoleRecord, QuestionRecord, ResumeAnalysis } from "./types";

export interface InterviewPrepServiceOptions {
  cache?: CatalogCache;
  tagger?: PartOfSpeechTagger | null;
}

/**
 * Long-lived holder of the read-only pieces an analysis needs: vocabulary,
 * the optional tagger and the catalog cache. Catalog files are re-read only
 * when they change on disk.
 */
export class InterviewPrepService {
  readonly vocabulary: SkillVocabulary;
  readonly tagger: PartOfSpeechTagger | null;
  private readonly cache: CatalogCache;
  private readonly stopWords: ReadonlySet<string>;

  constructor(
    private readonly config: AppConfig,
    options: InterviewPrepServiceOptions = {},
  ) {
    this.vocabulary = buildVocabulary(config.skills, {
      includeSoft: config.env.includeSoftSkills,
    });
    this.tagger =
      options.tagger !== undefined
        ? options.tagger
        : config.env.enablePosTagger
          ? createBrillTagger()
          : null;
    this.cache = options.cache ?? new CatalogCache();
    this.stopWords = new Set(config.stopwords.map((w) => w.toLowerCase()));
  }

  roles(): JobRoleRecord[] {
    return this.cache.jobRoles(this.config.env.jobRolesPath);
  }

  questions(): QuestionRecord[] {
    return this.cache.questions(this.config.env.questionsPath);
  }

  context(): AnalysisContext {
    return {
      vocabulary: this.vocabulary,
      roles: this.roles(),
      questions: this.questions(),
      difficulty: this.config.difficulty,
      ranking: {
        maxFeatures: this.config.ranking.maxFeatures,
        topN: this.config.ranking.topN,
        stopWords: this.stopWords,
      },
      tagger: this.tagger,
    };
  }

  extractSkills(text: string): string[] {
    return extractSkills(text, this.vocabulary, { tagger: this.tagger });
  }

  analyze(input: AnalysisInput): ResumeAnalysis {
    return analyzeResume(input, this.context());
  }

  reloadCatalogs(): void {
    this.cache.invalidate();
  }
}
