import { readFileSync, existsSync } from "fs";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { logger } from "./logger";

const skillsSchema = z.object({
  description: z.string().optional(),
  technical: z.array(z.string().min(1)),
  soft: z.array(z.string().min(1)).default([]),
});

const difficultySchema = z.object({
  description: z.string().optional(),
  keywords: z.object({
    hard: z.array(z.string().min(1)),
    medium: z.array(z.string().min(1)),
    easy: z.array(z.string().min(1)),
  }),
  thresholds: z.object({
    hardKeywordMin: z.number().int().min(1),
    hardWordCount: z.number().int().min(1),
    mediumWordCount: z.number().int().min(1),
  }),
});

const rankingSchema = z.object({
  description: z.string().optional(),
  maxFeatures: z.number().int().min(1),
  topN: z.number().int().min(1),
});

const stopwordsSchema = z.object({
  description: z.string().optional(),
  words: z.array(z.string()),
});

export type SkillsConfig = z.infer<typeof skillsSchema>;
export type DifficultyRules = z.infer<typeof difficultySchema>;
export type RankingConfig = z.infer<typeof rankingSchema>;

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  dataDir: string;
  jobRolesPath: string;
  questionsPath: string;
  rankingTopN: number | null;
  rankingMaxFeatures: number | null;
  enablePosTagger: boolean;
  includeSoftSkills: boolean;
}

export interface AppConfig {
  env: EnvConfig;
  skills: SkillsConfig;
  difficulty: DifficultyRules;
  ranking: RankingConfig;
  stopwords: string[];
}

const ROOT_DIR = join(dirname(fileURLToPath(import.meta.url)), "..");
const CONFIG_DIR = join(ROOT_DIR, "config");

function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

function parseOptionalEnvInt(
  value: string | undefined,
  min: number,
  max: number,
): number | null {
  if (value === undefined || value.trim() === "") return null;
  const parsed = parseEnvInt(value, Number.NaN, min, max);
  return Number.isNaN(parsed) ? null : parsed;
}

function parseEnvBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return ["true", "1", "yes", "on"].includes(value.trim().toLowerCase());
}

export function loadJsonConfig<T>(
  filename: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  configDir: string = CONFIG_DIR,
): T {
  const filepath = join(configDir, filename);

  if (!existsSync(filepath)) {
    throw new Error(`Config file not found: ${filepath}`);
  }

  let parsed: unknown;
  try {
    const raw = readFileSync(filepath, "utf-8");
    // Strip comments while preserving string contents.
    const json = raw.replace(
      /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
      (match, comment) => (comment ? "" : match),
    );
    parsed = JSON.parse(json);
  } catch (error) {
    throw new Error(`Failed to parse config file ${filename}: ${error}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config file ${filename}: ${issues}`);
  }
  return result.data;
}

export function loadEnvConfig(
  env: NodeJS.ProcessEnv = process.env,
): EnvConfig {
  const dataDir = resolve(env.DATA_DIR ?? join(ROOT_DIR, "data"));

  return {
    nodeEnv: env.NODE_ENV ?? "development",
    port: parseEnvInt(env.PORT, 3000, 1, 65535),
    dataDir,
    jobRolesPath: resolve(env.JOB_ROLES_PATH ?? join(dataDir, "job_roles.csv")),
    questionsPath: resolve(
      env.QUESTIONS_PATH ?? join(dataDir, "interview_questions.csv"),
    ),
    rankingTopN: parseOptionalEnvInt(env.RANKING_TOP_N, 1, 50),
    rankingMaxFeatures: parseOptionalEnvInt(env.RANKING_MAX_FEATURES, 1, 10000),
    enablePosTagger: parseEnvBool(env.ENABLE_POS_TAGGER, true),
    includeSoftSkills: parseEnvBool(env.INCLUDE_SOFT_SKILLS, false),
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  logger.info("Loading configuration...");

  const envConfig = loadEnvConfig(env);
  const skills = loadJsonConfig("skills.json", skillsSchema);
  const difficulty = loadJsonConfig("difficulty.json", difficultySchema);
  const rankingFile = loadJsonConfig("ranking.json", rankingSchema);
  const stopwords = loadJsonConfig("stopwords.json", stopwordsSchema);

  const ranking: RankingConfig = {
    ...rankingFile,
    topN: envConfig.rankingTopN ?? rankingFile.topN,
    maxFeatures: envConfig.rankingMaxFeatures ?? rankingFile.maxFeatures,
  };

  if (!envConfig.enablePosTagger) {
    logger.info("Part-of-speech tagging disabled — vocabulary scan only");
  }

  logger.info(`Config loaded successfully:`);
  logger.info(`  - ${skills.technical.length} technical skills`);
  logger.info(
    `  - ${skills.soft.length} soft skills${envConfig.includeSoftSkills ? "" : " (not extracted)"}`,
  );
  logger.info(
    `  - ranking: top ${ranking.topN}, ${ranking.maxFeatures} features, ${stopwords.words.length} stop words`,
  );
  logger.info(`  - roles: ${envConfig.jobRolesPath}`);
  logger.info(`  - questions: ${envConfig.questionsPath}`);
  logger.info(`  - Environment: ${envConfig.nodeEnv}`);

  return {
    env: envConfig,
    skills,
    difficulty,
    ranking,
    stopwords: stopwords.words,
  };
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
