import * as natural from "natural";
import { logger } from "../logger";

export interface TaggedToken {
  token: string;
  tag: string; // Penn Treebank tag, e.g. NN, NNP, VB
}

/**
 * Optional linguistic capability used to widen skill recall.
 * Constructed once by whoever owns the process and passed in explicitly.
 */
export interface PartOfSpeechTagger {
  tag(text: string): TaggedToken[];
}

export function isNounTag(tag: string): boolean {
  return tag.startsWith("NN");
}

/**
 * Brill tagger over the bundled English lexicon. Returns null when the
 * lexicon cannot be loaded; callers then run vocabulary-only extraction.
 */
export function createBrillTagger(): PartOfSpeechTagger | null {
  try {
    const lexicon = new natural.Lexicon("EN", "NN", "NNP");
    const ruleSet = new natural.RuleSet("EN");
    const tagger = new natural.BrillPOSTagger(lexicon, ruleSet);
    const tokenizer = new natural.WordTokenizer();

    logger.info("Part-of-speech tagger ready (Brill, EN lexicon)");

    return {
      tag(text: string): TaggedToken[] {
        const tokens = tokenizer.tokenize(text) ?? [];
        if (tokens.length === 0) return [];
        return tagger
          .tag(tokens)
          .taggedWords.map((word) => ({ token: word.token, tag: word.tag }));
      },
    };
  } catch (error) {
    logger.warn(
      `Part-of-speech tagger unavailable — continuing without it: ${error}`,
    );
    return null;
  }
}
