import { describe, expect, test } from "vitest";
import {
  clip,
  compoundingBonus,
  findTriggeredFactors,
  matchAgeBand,
  matchBmiBand,
  scoreRules,
} from "./scoring";
import { HEALTHY_INPUT, HIGH_RISK_INPUT, withInput } from "./testing/fixtures";

describe("age bands", () => {
  test("below 55 has no band", () => {
    expect(matchAgeBand(54.9)).toBeNull();
  });

  test("55-64 is +0.15", () => {
    expect(matchAgeBand(55)?.weight).toBe(0.15);
    expect(matchAgeBand(64)?.weight).toBe(0.15);
  });

  test("65-74 is +0.25", () => {
    expect(matchAgeBand(65)?.weight).toBe(0.25);
    expect(matchAgeBand(74.9)?.weight).toBe(0.25);
  });

  test("75+ is +0.35 and only the highest band applies", () => {
    const r = scoreRules(withInput({ age: 80 }));
    expect(r.triggered).toEqual([
      { id: "age", name: "Age 75 or older", weight: 0.35 },
    ]);
    expect(r.probability).toBe(0.35);
  });

  test("crossing 64 -> 65 never lowers the rule score", () => {
    const before = scoreRules(withInput({ age: 64 })).probability;
    const after = scoreRules(withInput({ age: 65 })).probability;
    expect(before).toBe(0.15);
    expect(after).toBe(0.25);
  });
});

describe("BMI bands", () => {
  test("unknown BMI triggers nothing", () => {
    expect(matchBmiBand(null)).toBeNull();
    expect(scoreRules(withInput({ bmi: null })).triggered).toEqual([]);
  });

  test("29.9 is below both bands", () => {
    expect(matchBmiBand(29.9)).toBeNull();
  });

  test("30 up to 35 is overweight", () => {
    expect(matchBmiBand(30)?.id).toBe("overweight");
    expect(matchBmiBand(34.9)?.id).toBe("overweight");
  });

  test("35 and above is obesity only, never obesity plus overweight", () => {
    const r = scoreRules(withInput({ bmi: 36 }));
    expect(r.triggered.map((f) => f.id)).toEqual(["obesity"]);
    expect(r.probability).toBe(0.15);
  });
});

describe("single factors", () => {
  test("heart disease is +0.30", () => {
    expect(scoreRules(withInput({ heartDisease: true })).probability).toBe(0.3);
  });

  test("hypertension is +0.25", () => {
    expect(scoreRules(withInput({ hypertension: true })).probability).toBe(0.25);
  });

  test("glucose threshold is inclusive at 126", () => {
    expect(scoreRules(withInput({ avgGlucoseLevel: 125.9 })).probability).toBe(0);
    expect(scoreRules(withInput({ avgGlucoseLevel: 126 })).probability).toBe(0.15);
  });

  test("only current smokers count", () => {
    expect(scoreRules(withInput({ smokingStatus: "former" })).probability).toBe(0);
    expect(scoreRules(withInput({ smokingStatus: "unknown" })).probability).toBe(0);
    expect(scoreRules(withInput({ smokingStatus: "current" })).probability).toBe(0.2);
  });

  test("no factors scores zero", () => {
    expect(scoreRules(HEALTHY_INPUT)).toEqual({
      triggered: [],
      weightSum: 0,
      compoundingBonus: 0,
      probability: 0,
    });
  });
});

describe("compounding bonus", () => {
  test("depends on the factor count only", () => {
    expect(compoundingBonus(0)).toBe(0);
    expect(compoundingBonus(1)).toBe(0);
    expect(compoundingBonus(2)).toBe(0.05);
    expect(compoundingBonus(3)).toBe(0.1);
    expect(compoundingBonus(6)).toBe(0.1);
  });

  test("two factors add +0.05 once", () => {
    const r = scoreRules(withInput({ hypertension: true, smokingStatus: "current" }));
    expect(r.triggered).toHaveLength(2);
    expect(r.compoundingBonus).toBe(0.05);
    expect(r.probability).toBeCloseTo(0.5, 10);
  });

  test("two light or two heavy factors get the same bonus", () => {
    const light = scoreRules(withInput({ bmi: 31, avgGlucoseLevel: 130 }));
    const heavy = scoreRules(withInput({ age: 76, heartDisease: true }));
    expect(light.compoundingBonus).toBe(0.05);
    expect(heavy.compoundingBonus).toBe(0.05);
    expect(light.probability).toBeCloseTo(0.3, 10);
    expect(heavy.probability).toBeCloseTo(0.7, 10);
  });

  test("three factors add +0.10 once", () => {
    const r = scoreRules(
      withInput({ heartDisease: true, avgGlucoseLevel: 130, bmi: 31 })
    );
    expect(r.triggered).toHaveLength(3);
    expect(r.compoundingBonus).toBe(0.1);
    expect(r.probability).toBeCloseTo(0.65, 10);
  });
});

describe("clipping", () => {
  test("clip keeps values inside [0, 1]", () => {
    expect(clip(1.45)).toBe(1);
    expect(clip(-0.2)).toBe(0);
    expect(clip(0.42)).toBe(0.42);
  });

  test("all factors saturate at exactly 1", () => {
    const r = scoreRules(HIGH_RISK_INPUT);
    expect(r.triggered.map((f) => f.id)).toEqual([
      "age",
      "heart_disease",
      "hypertension",
      "diabetes",
      "smoking",
      "overweight",
    ]);
    expect(r.weightSum).toBeCloseTo(1.35, 10);
    expect(r.compoundingBonus).toBe(0.1);
    expect(r.probability).toBe(1);
  });
});

describe("findTriggeredFactors", () => {
  test("lists factors in rule-table order", () => {
    const ids = findTriggeredFactors(
      withInput({ bmi: 40, age: 60, smokingStatus: "current" })
    ).map((f) => f.id);
    expect(ids).toEqual(["age", "smoking", "obesity"]);
  });
});
