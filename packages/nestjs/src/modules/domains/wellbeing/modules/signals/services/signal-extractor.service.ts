import { Injectable } from "@nestjs/common";

import { clamp, tokenize } from "../../../../../../common/utils/text.utils";
import affectLexicon from "../data/affect-lexicon.json";
import {
  ANXIETY_KEYWORDS,
  DEGREE_MODIFIERS,
  NEGATION_WORDS,
  SADNESS_KEYWORDS,
} from "../emotion-keywords";

/**
 * Lexical signals read from one message
 */
export interface Signals {
  /**
   * Normalized affect score in [-1, 1]
   */
  polarity: number;

  /**
   * Share of tokens carrying affect, in [0, 1]
   */
  subjectivity: number;

  tokens: string[];
  affectTokenCount: number;
  anxietyKeywords: string[];
  sadnessKeywords: string[];
}

// Normalization constant: polarity = s / sqrt(s^2 + ALPHA)
const ALPHA = 15;
const NEGATION_SCALAR = -0.75;
const NEGATION_WINDOW = 2;

const LEXICON: ReadonlyMap<string, number> = new Map(
  Object.entries(affectLexicon),
);

@Injectable()
export class SignalExtractorService {
  extract(text: string): Signals {
    const tokens = tokenize(text);

    let score = 0;
    let affectTokenCount = 0;
    // Words that are not in the lexicon. Negation and degree are read from
    // these only, so lexicon words never shift another word's context.
    const context: string[] = [];

    for (const token of tokens) {
      const base = LEXICON.get(token);

      if (base === undefined) {
        if (DEGREE_MODIFIERS.has(token)) {
          affectTokenCount++;
        }
        context.push(token);
        continue;
      }

      affectTokenCount++;
      score += this.weigh(base, context);
    }

    return {
      polarity: this.normalize(score),
      subjectivity:
        tokens.length === 0 ? 0 : clamp(affectTokenCount / tokens.length, 0, 1),
      tokens,
      affectTokenCount,
      anxietyKeywords: this.matchKeywords(tokens, ANXIETY_KEYWORDS),
      sadnessKeywords: this.matchKeywords(tokens, SADNESS_KEYWORDS),
    };
  }

  /**
   * Score of one lexicon word given the non-lexicon words before it. A degree
   * modifier directly in front scales it. A negation in the window flips a
   * negative word and cancels a positive one.
   */
  private weigh(base: number, context: readonly string[]): number {
    const degree = DEGREE_MODIFIERS.get(context[context.length - 1] ?? "") ?? 1;
    const weighted = base * degree;

    const negated = context
      .slice(-NEGATION_WINDOW)
      .some((token) => NEGATION_WORDS.has(token));

    if (!negated) {
      return weighted;
    }

    return weighted < 0 ? weighted * NEGATION_SCALAR : 0;
  }

  private normalize(score: number): number {
    if (score === 0) {
      return 0;
    }

    return clamp(score / Math.sqrt(score * score + ALPHA), -1, 1);
  }

  private matchKeywords(
    tokens: string[],
    keywords: ReadonlySet<string>,
  ): string[] {
    return [...new Set(tokens.filter((token) => keywords.has(token)))];
  }
}
