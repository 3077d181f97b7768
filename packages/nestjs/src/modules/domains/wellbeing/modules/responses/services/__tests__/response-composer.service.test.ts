import { describe, expect, it } from "vitest";

import {
  SentimentCategory,
  type SentimentResult,
} from "../../../../../../../common/types/sentiment.type";
import {
  createSeededRandom,
  type RandomSource,
} from "../../../../../../../common/utils/random.utils";
import responseTemplates from "../../data/response-templates.json";
import { ResponseComposerService } from "../response-composer.service";
import { ResponseTemplateStore } from "../response-template.store";

const createComposer = (random: RandomSource) =>
  new ResponseComposerService(
    new ResponseTemplateStore(responseTemplates),
    random,
  );

const result = (
  category: SentimentCategory,
  sourceText: string,
): SentimentResult => ({ category, confidence: 0.8, sourceText });

describe("ResponseComposerService", () => {
  describe("compose", () => {
    it("should reflect key terms and affirm a positive message", () => {
      const composer = createComposer(() => 0);

      const response = composer.compose(
        result(
          SentimentCategory.POSITIVE,
          "I just got promoted at work and I'm feeling amazing!",
        ),
      );

      expect(response).toBe(
        `${responseTemplates.positive[0]} I notice you mentioned promoted, work. These good feelings are worth celebrating and remembering for the days that feel harder.`,
      );
    });

    it("should add a grounding suggestion for anxiety", () => {
      const composer = createComposer(() => 0.99);

      const response = composer.compose(
        result(SentimentCategory.ANXIETY, "I am so worried"),
      );

      expect(response).toBe(
        `${responseTemplates.anxiety[2]} I notice you mentioned worried. If it helps, try a few slow breaths, in for four and out for six, or ground yourself by naming five things you can see around you.`,
      );
    });

    it("should add a self-care suggestion for sadness", () => {
      const composer = createComposer(() => 0.5);

      const response = composer.compose(
        result(SentimentCategory.SADNESS, "so sad"),
      );

      expect(response).toBe(
        `${responseTemplates.sadness[1]} Please be gentle with yourself right now. Small acts of self-care, like resting, eating something nourishing or reaching out to someone, can make a difference.`,
      );
    });

    it("should add nothing after the template for neutral and negative messages", () => {
      const composer = createComposer(() => 0);

      expect(composer.compose(result(SentimentCategory.NEUTRAL, "ok"))).toBe(
        responseTemplates.neutral[0],
      );
      expect(composer.compose(result(SentimentCategory.NEGATIVE, "bad"))).toBe(
        responseTemplates.negative[0],
      );
    });

    it("should pick the same templates for the same seed", () => {
      const first = createComposer(createSeededRandom(7));
      const second = createComposer(createSeededRandom(7));
      const message = result(SentimentCategory.NEUTRAL, "hm");

      const firstRun = Array.from({ length: 10 }, () => first.compose(message));
      const secondRun = Array.from({ length: 10 }, () =>
        second.compose(message),
      );

      expect(secondRun).toEqual(firstRun);
    });

    it("should only ever draw templates of the message's category", () => {
      const composer = createComposer(createSeededRandom(123));

      for (let i = 0; i < 30; i++) {
        const response = composer.compose(
          result(SentimentCategory.NEGATIVE, "no"),
        );

        expect(responseTemplates.negative).toContain(response);
      }
    });
  });

  describe("keyTerms", () => {
    const composer = createComposer(() => 0);

    it("should skip short words and stopwords", () => {
      expect(composer.keyTerms("I really think that my exams went badly")).toEqual(
        ["exams", "went"],
      );
    });

    it("should skip repeated words regardless of case", () => {
      expect(composer.keyTerms("Work work WORK and family")).toEqual([
        "Work",
        "family",
      ]);
    });

    it("should keep accented words whole", () => {
      expect(composer.keyTerms("Jürgen left the café")).toEqual([
        "Jürgen",
        "left",
      ]);
      expect(composer.keyTerms("Ça va, Zoë?")).toEqual([]);
    });

    it("should skip numbers", () => {
      expect(composer.keyTerms("2024 was long")).toEqual(["long"]);
    });

    it("should return nothing when no word qualifies", () => {
      expect(composer.keyTerms("I am ok")).toEqual([]);
    });
  });
});
