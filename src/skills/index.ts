import { logger } from "../logger";
import type { SkillsConfig } from "../config";
import type { SkillBreakdownEntry, SkillKind } from "../types";
import { isNounTag, type PartOfSpeechTagger } from "./tagger";

export type { PartOfSpeechTagger, TaggedToken } from "./tagger";
export { createBrillTagger, isNounTag } from "./tagger";

// Vocabulary

export interface SkillVocabulary {
  entries: readonly string[]; // lower-cased, first occurrence order
  kinds: ReadonlyMap<string, SkillKind>;
}

export function buildVocabulary(
  skills: SkillsConfig,
  options: { includeSoft?: boolean } = {},
): SkillVocabulary {
  const kinds = new Map<string, SkillKind>();

  const add = (raw: string, kind: SkillKind) => {
    const key = raw.trim().toLowerCase();
    if (key && !kinds.has(key)) kinds.set(key, kind);
  };

  skills.technical.forEach((s) => add(s, "Technical"));
  if (options.includeSoft) {
    skills.soft.forEach((s) => add(s, "Soft"));
  }

  return Object.freeze({
    entries: Object.freeze([...kinds.keys()]),
    kinds,
  });
}

export function vocabularyFrom(entries: readonly string[]): SkillVocabulary {
  return buildVocabulary({ technical: [...entries], soft: [] });
}

// Labels

/** Upper-cases the first letter of every run of letters, lower-cases the rest. */
export function toTitleCase(value: string): string {
  let previousWasLetter = false;
  let out = "";
  for (const char of value) {
    const isLetter = /\p{L}/u.test(char);
    out += isLetter
      ? previousWasLetter
        ? char.toLowerCase()
        : char.toUpperCase()
      : char;
    previousWasLetter = isLetter;
  }
  return out;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const WORD_CHAR = "[\\p{L}\\p{N}_]";
const WORD_CHAR_TEST = /[\p{L}\p{N}_]/u;

/**
 * Unicode word-boundary match for one vocabulary entry. A boundary sits
 * between a word character and a non-word character, so an entry that
 * starts or ends with punctuation ("c++", "c#") needs a word character on
 * the far side of it.
 */
export function wholeWordPattern(entry: string): RegExp {
  const before = WORD_CHAR_TEST.test(entry.charAt(0))
    ? `(?<!${WORD_CHAR})`
    : `(?<=${WORD_CHAR})`;
  const after = WORD_CHAR_TEST.test(entry.charAt(entry.length - 1))
    ? `(?!${WORD_CHAR})`
    : `(?=${WORD_CHAR})`;
  return new RegExp(`${before}${escapeRegExp(entry)}${after}`, "iu");
}

function sortLabels(labels: Iterable<string>): string[] {
  return [...labels].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

// Extraction

export interface ExtractOptions {
  tagger?: PartOfSpeechTagger | null;
}

export function extractSkills(
  text: string,
  vocabulary: SkillVocabulary,
  options: ExtractOptions = {},
): string[] {
  if (!text) return [];

  const found = new Set<string>();

  for (const entry of vocabulary.entries) {
    if (wholeWordPattern(entry).test(text)) {
      found.add(toTitleCase(entry));
    }
  }

  if (options.tagger) {
    try {
      for (const { token, tag } of options.tagger.tag(text)) {
        if (!isNounTag(tag) || token.length <= 2) continue;
        if (vocabulary.kinds.has(token.toLowerCase())) {
          found.add(toTitleCase(token));
        }
      }
    } catch (error) {
      logger.warn(`Skill tagging failed — using vocabulary scan only: ${error}`);
    }
  }

  return sortLabels(found);
}

export function describeSkills(
  skills: readonly string[],
  vocabulary: SkillVocabulary,
): SkillBreakdownEntry[] {
  return skills.map((skill) => ({
    skill,
    kind: vocabulary.kinds.get(skill.toLowerCase()) ?? "Technical",
  }));
}
