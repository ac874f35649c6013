import { readFileSync, statSync } from "fs";
import { logger } from "../logger";
import { isQuestionCategory } from "../types";
import type { JobRoleRecord, QuestionRecord } from "../types";
import { parseCsv } from "./csv";

export { parseCsv, toCsv, escapeCsvField } from "./csv";

export const DEFAULT_STORED_DIFFICULTY = "Medium";

type CsvRecord = Record<string, string | undefined>;

/**
 * Maps data rows onto header names. Rows with more fields than the header
 * are malformed and skipped; short rows leave trailing columns undefined.
 */
function toRecords(text: string): { records: CsvRecord[]; skipped: number } {
  const [header, ...rows] = parseCsv(text);
  if (!header) return { records: [], skipped: 0 };

  const columns = header.map((name) => name.trim());
  const records: CsvRecord[] = [];
  let skipped = 0;

  for (const row of rows) {
    if (row.length > columns.length) {
      skipped++;
      continue;
    }
    const record: CsvRecord = {};
    columns.forEach((column, index) => {
      record[column] = row[index];
    });
    records.push(record);
  }

  return { records, skipped };
}

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== "";
}

export function parseJobRoles(text: string): JobRoleRecord[] {
  const { records, skipped: malformed } = toRecords(text);
  let skipped = malformed;
  const roles: JobRoleRecord[] = [];

  for (const record of records) {
    const roleName = record.Job_Role;
    const keySkills = record.Key_Skills;
    if (!present(roleName) || !present(keySkills)) {
      skipped++;
      continue;
    }
    roles.push({
      roleName: roleName.trim(),
      requiredSkills: keySkills
        .split(",")
        .map((skill) => skill.trim())
        .filter(Boolean),
    });
  }

  if (skipped > 0) logger.debug(`Job roles: skipped ${skipped} malformed rows`);
  return roles;
}

export function parseQuestions(text: string): QuestionRecord[] {
  const { records, skipped: malformed } = toRecords(text);
  let skipped = malformed;
  const questions: QuestionRecord[] = [];

  for (const record of records) {
    const roleName = record.Job_Role;
    const category = record.Question_Type?.trim();
    const question = record.Question;
    const difficulty = record.Difficulty;
    if (!present(roleName) || !present(question) || !category) {
      skipped++;
      continue;
    }
    if (!isQuestionCategory(category)) {
      skipped++;
      continue;
    }
    questions.push({
      roleName: roleName.trim(),
      category,
      text: question.trim(),
      storedDifficulty: present(difficulty)
        ? difficulty.trim()
        : DEFAULT_STORED_DIFFICULTY,
    });
  }

  if (skipped > 0) logger.debug(`Questions: skipped ${skipped} malformed rows`);
  return questions;
}

export function loadJobRoles(path: string): JobRoleRecord[] {
  try {
    return parseJobRoles(readFileSync(path, "utf-8"));
  } catch (error) {
    logger.error(`Error loading job roles from ${path}: ${error}`);
    return [];
  }
}

export function loadQuestions(path: string): QuestionRecord[] {
  try {
    return parseQuestions(readFileSync(path, "utf-8"));
  } catch (error) {
    logger.error(`Error loading questions from ${path}: ${error}`);
    return [];
  }
}

export function listRoles(roles: readonly JobRoleRecord[]): string[] {
  return [...new Set(roles.map((role) => role.roleName))];
}

// Read-through cache

interface CacheEntry<T> {
  mtimeMs: number;
  value: T;
}

/**
 * Caches parsed catalog files by path, reloading when the file's
 * modification time changes. Owned by the caller; nothing here is global.
 */
export class CatalogCache {
  private roleEntries = new Map<string, CacheEntry<JobRoleRecord[]>>();
  private questionEntries = new Map<string, CacheEntry<QuestionRecord[]>>();

  jobRoles(path: string): JobRoleRecord[] {
    return this.read(this.roleEntries, path, loadJobRoles);
  }

  questions(path: string): QuestionRecord[] {
    return this.read(this.questionEntries, path, loadQuestions);
  }

  invalidate(path?: string): void {
    if (path === undefined) {
      this.roleEntries.clear();
      this.questionEntries.clear();
      return;
    }
    this.roleEntries.delete(path);
    this.questionEntries.delete(path);
  }

  get size(): number {
    return this.roleEntries.size + this.questionEntries.size;
  }

  private read<T>(
    store: Map<string, CacheEntry<T>>,
    path: string,
    load: (path: string) => T,
  ): T {
    let mtimeMs: number;
    try {
      mtimeMs = statSync(path).mtimeMs;
    } catch (error) {
      logger.warn(`Catalog ${path} is not readable: ${error}`);
      store.delete(path);
      return load(path);
    }

    const cached = store.get(path);
    if (cached && cached.mtimeMs === mtimeMs) {
      return cached.value;
    }

    const value = load(path);
    store.set(path, { mtimeMs, value });
    logger.debug(`Catalog ${path} loaded`);
    return value;
  }
}
