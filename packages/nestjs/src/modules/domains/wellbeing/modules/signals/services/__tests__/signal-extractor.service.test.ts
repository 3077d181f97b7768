import { beforeEach, describe, expect, it } from "vitest";

import { SignalExtractorService } from "../signal-extractor.service";

const normalized = (score: number) => score / Math.sqrt(score * score + 15);

describe("SignalExtractorService", () => {
  let extractor: SignalExtractorService;

  beforeEach(() => {
    extractor = new SignalExtractorService();
  });

  describe("polarity", () => {
    it("should score text without affect words as zero", () => {
      const signals = extractor.extract("Download the report by noon");

      expect(signals.polarity).toBe(0);
      expect(signals.subjectivity).toBe(0);
      expect(signals.affectTokenCount).toBe(0);
    });

    it("should scale an affect word by the degree modifier in front of it", () => {
      const signals = extractor.extract("I am so happy today");

      expect(signals.polarity).toBeCloseTo(normalized(3 * 1.3), 6);
      expect(signals.affectTokenCount).toBe(2);
      expect(signals.subjectivity).toBeCloseTo(2 / 5, 6);
    });

    it("should flip a negated negative word", () => {
      const signals = extractor.extract("This is not bad");

      expect(signals.polarity).toBeCloseTo(normalized(2.25), 6);
    });

    it("should cancel a negated positive word", () => {
      const signals = extractor.extract("I am not happy");

      expect(signals.polarity).toBe(0);
      expect(signals.affectTokenCount).toBe(1);
    });

    it("should treat curly apostrophes in contractions as negations", () => {
      const signals = extractor.extract("I don’t feel bad");

      expect(signals.tokens).toEqual(["i", "don't", "feel", "bad"]);
      expect(signals.polarity).toBeCloseTo(normalized(2.25), 6);
    });

    it("should keep a negation in force across affect words in between", () => {
      const signals = extractor.extract("not good really bad");

      expect(signals.polarity).toBeCloseTo(normalized(-3 * 1.3 * -0.75), 6);
      expect(signals.polarity).toBe(extractor.extract("not really bad").polarity);
    });

    it("should never decrease when positive words are added", () => {
      const texts = [
        "the day was fine",
        "the day was fine and good",
        "the day was fine and good and great",
        "the day was fine and good and great and wonderful",
      ];

      const scores = texts.map((text) => extractor.extract(text).polarity);

      for (let i = 1; i < scores.length; i++) {
        expect(scores[i]).toBeGreaterThan(scores[i - 1]);
      }
    });

    it.each([
      ["not really bad", "not good really bad"],
      ["I am not", "I am not happy"],
      ["I am not", "I am not happy at all"],
      ["barely bad", "barely good bad"],
      ["extremely amazing", "extremely okay amazing"],
      ["never sad or lonely", "never sad, happy or lonely"],
      ["hardly tired", "great, hardly tired"],
    ])(
      "should score %j no higher than %j",
      (before, after) => {
        expect(extractor.extract(after).polarity).toBeGreaterThanOrEqual(
          extractor.extract(before).polarity,
        );
      },
    );

    it("should stay within [-1, 1] for long runs of affect words", () => {
      const positive = extractor.extract("amazing ".repeat(200));
      const negative = extractor.extract("terrible ".repeat(200));

      expect(positive.polarity).toBeLessThanOrEqual(1);
      expect(positive.polarity).toBeGreaterThan(0.99);
      expect(negative.polarity).toBeGreaterThanOrEqual(-1);
      expect(negative.polarity).toBeLessThan(-0.99);
    });
  });

  describe("keywords", () => {
    it("should flag anxiety and sadness keywords at the same time", () => {
      const signals = extractor.extract("I feel anxious and sad, so anxious");

      expect(signals.anxietyKeywords).toEqual(["anxious"]);
      expect(signals.sadnessKeywords).toEqual(["sad"]);
    });

    it("should match whole words only", () => {
      const signals = extractor.extract(
        "Sadie is downloading the stressful paperwork",
      );

      expect(signals.anxietyKeywords).toEqual([]);
      expect(signals.sadnessKeywords).toEqual([]);
    });

    it("should keep accented words whole", () => {
      const signals = extractor.extract("I love listening to Sadé");

      expect(signals.tokens).toEqual(["i", "love", "listening", "to", "sadé"]);
      expect(signals.sadnessKeywords).toEqual([]);
    });

    it("should match keywords regardless of case", () => {
      const signals = extractor.extract("PANIC everywhere, feeling Down");

      expect(signals.anxietyKeywords).toEqual(["panic"]);
      expect(signals.sadnessKeywords).toEqual(["down"]);
    });
  });

  it("should be a pure function of its input", () => {
    const text = "I'm worried but hopeful about tomorrow";

    expect(extractor.extract(text)).toEqual(extractor.extract(text));
  });
});
