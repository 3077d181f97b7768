import { Injectable } from "@nestjs/common";

import {
  SentimentCategory,
  type SentimentResult,
} from "../../../../../../common/types/sentiment.type";
import {
  InjectRandomSource,
  pickOne,
  type RandomSource,
} from "../../../../../../common/utils/random.utils";
import { extractWords } from "../../../../../../common/utils/text.utils";
import stopwords from "../data/stopwords.json";
import { ResponseTemplateStore } from "./response-template.store";

const STOPWORDS: ReadonlySet<string> = new Set(stopwords);

const MAX_KEY_TERMS = 2;
const MIN_KEY_TERM_LENGTH = 4;

const CLOSING_GUIDANCE: Partial<Record<SentimentCategory, string>> = {
  [SentimentCategory.ANXIETY]:
    "If it helps, try a few slow breaths, in for four and out for six, or ground yourself by naming five things you can see around you.",
  [SentimentCategory.SADNESS]:
    "Please be gentle with yourself right now. Small acts of self-care, like resting, eating something nourishing or reaching out to someone, can make a difference.",
  [SentimentCategory.POSITIVE]:
    "These good feelings are worth celebrating and remembering for the days that feel harder.",
};

@Injectable()
export class ResponseComposerService {
  constructor(
    private readonly templateStore: ResponseTemplateStore,
    @InjectRandomSource() private readonly random: RandomSource,
  ) {}

  compose(result: SentimentResult): string {
    const template = pickOne(
      this.templateStore.templatesFor(result.category),
      this.random,
    );

    return [
      template,
      this.reflection(result.sourceText),
      CLOSING_GUIDANCE[result.category],
    ]
      .filter((part): part is string => Boolean(part))
      .join(" ");
  }

  /**
   * Up to two content words from the message, in the order they appear
   */
  keyTerms(text: string): string[] {
    const seen = new Set<string>();
    const terms: string[] = [];

    for (const word of extractWords(text)) {
      const lower = word.toLowerCase();

      if (
        word.length < MIN_KEY_TERM_LENGTH ||
        !/\p{L}/u.test(word) ||
        STOPWORDS.has(lower) ||
        seen.has(lower)
      ) {
        continue;
      }

      seen.add(lower);
      terms.push(word);

      if (terms.length === MAX_KEY_TERMS) {
        break;
      }
    }

    return terms;
  }

  private reflection(text: string): string | undefined {
    const terms = this.keyTerms(text);

    return terms.length > 0
      ? `I notice you mentioned ${terms.join(", ")}.`
      : undefined;
  }
}
