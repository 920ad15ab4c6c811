import { describe, expect, test } from "vitest";
import {
  classify,
  getDefaultClassifierRules,
  loadClassifierRules,
  parseClassifierRules,
  type ClassifierRuleSet
} from "../src/classifier";
import { MalformedConfigError } from "../src/errors";

describe("classify", () => {
  test("routes status checks to administrative", () => {
    expect(classify("检查状态")).toEqual({
      primaryType: "administrative",
      confidence: 1,
      scores: { administrative: 2 }
    });
  });

  test("falls back to general without any keyword", () => {
    expect(classify("hmm okay")).toEqual({ primaryType: "general", confidence: 0.5, scores: {} });
    expect(classify("")).toEqual({ primaryType: "general", confidence: 0.5, scores: {} });
  });

  test("adds the question bonus to factual", () => {
    expect(classify("Ok?")).toEqual({ primaryType: "factual", confidence: 1, scores: { factual: 0.5 } });
    expect(classify("好的？").primaryType).toBe("factual");
  });

  test("mixes keyword hits and the question bonus", () => {
    const result = classify("what date is the deadline?");

    expect(result.primaryType).toBe("factual_date");
    expect(result.scores).toEqual({ factual_date: 2, factual: 0.5 });
    expect(result.confidence).toBeCloseTo(0.8);
  });

  test("matches keywords case-insensitively", () => {
    expect(classify("Weekly STATUS Report").primaryType).toBe("administrative");
  });

  test("breaks ties by rule order", () => {
    const english = classify("compare the design");
    expect(english.primaryType).toBe("analytical");
    expect(english.confidence).toBe(0.5);

    const chinese = classify("为什么进度慢");
    expect(chinese.primaryType).toBe("administrative");
    expect(chinese.confidence).toBe(0.5);
  });

  test("keeps confidence within bounds and scores positive", () => {
    const queries = ["列出所有技能", "why did the report slip?", "brainstorm ideas", "你好", "谁负责 deadline"];

    for (const query of queries) {
      const result = classify(query);
      expect(result.confidence).toBeGreaterThan(0);
      expect(result.confidence).toBeLessThanOrEqual(1);
      for (const score of Object.values(result.scores)) {
        expect(score).toBeGreaterThan(0);
      }
    }
  });

  test("honours a custom rule set", () => {
    const rules: ClassifierRuleSet = {
      version: 1,
      defaultType: "factual",
      defaultConfidence: 0.3,
      questionBonus: { type: "creative", weight: 2, markers: ["!"] },
      rules: [
        { type: "creative", keywords: ["sketch"] },
        { type: "analytical", keywords: ["audit", "review"] }
      ]
    };

    expect(classify("audit and review the sketch", rules)).toEqual({
      primaryType: "analytical",
      confidence: 2 / 3,
      scores: { creative: 1, analytical: 2 }
    });
    expect(classify("nothing here", rules)).toEqual({ primaryType: "factual", confidence: 0.3, scores: {} });
    expect(classify("review!", rules).primaryType).toBe("creative");
  });
});

describe("classifier rules", () => {
  test("the bundled rule set lists every category once", () => {
    const rules = getDefaultClassifierRules();

    expect(rules.rules.map((rule) => rule.type)).toEqual([
      "factual_date",
      "administrative",
      "analytical",
      "creative",
      "factual_list",
      "factual",
      "general"
    ]);
    expect(rules.defaultType).toBe("general");
  });

  test("rejects duplicate categories", () => {
    const input = {
      version: 1,
      defaultType: "general",
      defaultConfidence: 0.5,
      questionBonus: { type: "factual", weight: 0.5, markers: ["?"] },
      rules: [
        { type: "factual", keywords: ["who"] },
        { type: "factual", keywords: ["where"] }
      ]
    };

    expect(() => parseClassifierRules(input)).toThrow(MalformedConfigError);
    expect(() => parseClassifierRules(input)).toThrow("rules.1.type: duplicate query type factual");
  });

  test("rejects a question bonus for a category without a rule", () => {
    const input = {
      version: 1,
      defaultType: "general",
      defaultConfidence: 0.5,
      questionBonus: { type: "creative", weight: 0.5, markers: ["?"] },
      rules: [{ type: "factual", keywords: ["who"] }]
    };

    expect(() => parseClassifierRules(input)).toThrow("questionBonus.type: question bonus type creative has no rule");
  });

  test("reports an unreadable rules file", () => {
    expect(() => loadClassifierRules("/nonexistent/tierwise-rules.json")).toThrow(MalformedConfigError);
  });
});
