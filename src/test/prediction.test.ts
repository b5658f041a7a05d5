import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  buildPredictionReport,
  classifyDuration,
  classifySeverity,
  extractSeverityScore,
  matchConditions,
  riskMarker,
} from "../modules/prediction/prediction.service";

const conditionNames = (symptoms: string, severity: "HIGH" | "MODERATE" | "MILD", extra = "") =>
  matchConditions(symptoms, severity, extra).map((prediction) => prediction.condition);

describe("extractSeverityScore", () => {
  it("prefers an N/10 fraction", () => {
    assert.equal(extractSeverityScore("7/10"), 7);
    assert.equal(extractSeverityScore("pain 8 / 10"), 8);
  });

  it("falls back to a standalone number", () => {
    assert.equal(extractSeverityScore("about an 8"), 8);
  });

  it("returns undefined without a number", () => {
    assert.equal(extractSeverityScore("moderate"), undefined);
  });
});

describe("classifySeverity", () => {
  it("maps words to levels", () => {
    assert.equal(classifySeverity("Severe"), "HIGH");
    assert.equal(classifySeverity("worst ever"), "HIGH");
    assert.equal(classifySeverity("significant"), "MODERATE");
    assert.equal(classifySeverity("mild"), "MILD");
  });

  it("maps scores to levels", () => {
    assert.equal(classifySeverity("9/10"), "HIGH");
    assert.equal(classifySeverity("10"), "HIGH");
    assert.equal(classifySeverity("6"), "MODERATE");
    assert.equal(classifySeverity("3/10"), "MILD");
  });

  it("treats scores outside the 0-10 scale as mild", () => {
    assert.equal(classifySeverity("12"), "MILD");
    assert.equal(classifySeverity("15/10"), "MILD");
    assert.equal(classifySeverity("100"), "MILD");
  });

  it("does not read the denominator of 7/10 as a 10", () => {
    assert.equal(classifySeverity("7/10"), "MODERATE");
  });
});

describe("classifyDuration", () => {
  it("classifies prolonged durations", () => {
    assert.equal(classifyDuration("1 week"), "PROLONGED");
    assert.equal(classifyDuration("2 years"), "PROLONGED");
    assert.equal(classifyDuration("Chronic"), "PROLONGED");
  });

  it("classifies multi-day durations", () => {
    assert.equal(classifyDuration("3 days"), "MODERATE");
    assert.equal(classifyDuration("4 day"), "MODERATE");
  });

  it("treats everything else as acute", () => {
    assert.equal(classifyDuration("1 day"), "ACUTE");
    assert.equal(classifyDuration("since this morning"), "ACUTE");
  });
});

describe("matchConditions", () => {
  it("matches dengue, viral fever and non-respiratory infection together", () => {
    assert.deepEqual(conditionNames("Fever, headache behind eyes, nausea, body ache", "MODERATE"), [
      "Dengue Fever",
      "Viral Fever (Influenza/Common Viral Infection)",
      "Non-Respiratory Viral Infection",
    ]);
  });

  it("separates cough with and without fever", () => {
    assert.deepEqual(conditionNames("cough and fever", "MILD"), [
      "Lower Respiratory Tract Infection (Bronchitis/Pneumonia)",
    ]);
    assert.deepEqual(conditionNames("dry cough", "MILD"), [
      "Post-Viral Cough / Upper Respiratory Infection",
    ]);
  });

  it("flags a sudden severe headache", () => {
    assert.deepEqual(conditionNames("sudden headache", "HIGH"), [
      "⚠️ SERIOUS: Possible Meningitis/Intracranial Issue",
    ]);
    assert.deepEqual(conditionNames("sudden headache", "MODERATE"), ["Undifferentiated Viral Illness"]);
  });

  it("uses seafood in the additional info for food poisoning", () => {
    assert.deepEqual(conditionNames("stomach cramps", "MILD", "Ate SEAFOOD yesterday"), [
      "Food Poisoning / Gastroenteritis",
    ]);
  });

  it("matches migraine on headache, nausea and light sensitivity", () => {
    assert.deepEqual(conditionNames("headache with nausea, bright light hurts", "MODERATE"), ["Migraine"]);
  });

  it("falls back to an undifferentiated illness", () => {
    assert.deepEqual(conditionNames("tired", "MILD"), ["Undifferentiated Viral Illness"]);
  });
});

describe("riskMarker", () => {
  it("picks the marker from the risk label", () => {
    assert.equal(riskMarker("🚨 VERY HIGH"), "🚨");
    assert.equal(riskMarker("MODERATE-HIGH"), "🚨");
    assert.equal(riskMarker("LOW-MODERATE"), "⚠️");
    assert.equal(riskMarker("LOW"), "ℹ️");
  });
});

describe("buildPredictionReport", () => {
  it("summarises the input and ranks conditions", () => {
    const lines = buildPredictionReport({
      symptoms: "fever, headache behind eyes, nausea, body ache",
      duration: "2 days",
      severity: "7/10",
    }).split("\n");

    assert.deepEqual(lines.slice(0, 13), [
      "🔬 **DISEASE PREDICTION ANALYSIS**",
      "",
      "📋 **Symptoms Summary:**",
      "• Primary: fever, headache behind eyes, nausea, body ache",
      "• Duration: 2 days (MODERATE)",
      "• Severity: 7/10 (MODERATE risk)",
      "",
      "---",
      "",
      "🎯 **Most Likely Conditions:**",
      "",
      "**1. Dengue Fever**",
      "🚨 Probability: HIGH (75-85%) | Risk Level: MODERATE-HIGH",
    ]);
    assert.ok(lines.includes("**2. Viral Fever (Influenza/Common Viral Infection)**"));
    assert.ok(lines.includes("**3. Non-Respiratory Viral Infection**"));
    assert.ok(lines.includes("• Symptoms persist beyond 1 day without improvement"));
    assert.equal(
      lines[lines.length - 1],
      "📞 **Need Human Medical Advice?** Contact your healthcare provider or visit nearest clinic/hospital."
    );
  });

  it("adds the additional line only when given and waits 3 days for acute cases", () => {
    const withInfo = buildPredictionReport({
      symptoms: "cough",
      duration: "today",
      severity: "mild",
      additionalInfo: "no fever",
    }).split("\n");
    assert.equal(withInfo[6], "• Additional: no fever");
    assert.ok(withInfo.includes("• Symptoms persist beyond 3 days without improvement"));

    const without = buildPredictionReport({ symptoms: "cough", duration: "today", severity: "mild" });
    assert.ok(!without.includes("• Additional:"));
  });

  it("reports at most five conditions", () => {
    const symptoms =
      "sudden fever, headache behind eyes, nausea, muscle pain, light sensitivity, cough after food";
    assert.equal(matchConditions(symptoms, "HIGH").length, 6);

    const report = buildPredictionReport({ symptoms, duration: "1 day", severity: "severe" });
    assert.ok(report.includes("**5. Lower Respiratory Tract Infection (Bronchitis/Pneumonia)**"));
    assert.ok(!report.includes("Food Poisoning / Gastroenteritis"));
  });
});
