// ============================================================
// Prediction Service — Symptom-to-Condition Heuristic
// ============================================================
// Turns what the user described into a ranked list of likely
// conditions and a markdown report. No model is involved: it is
// keyword matching over lower-cased text.
//
// STEPS:
//   1. Severity  → HIGH / MODERATE / MILD
//   2. Duration  → PROLONGED / MODERATE / ACUTE
//   3. Rules     → checked in order, each can add one condition
//   4. Fallback  → "Undifferentiated Viral Illness" if none hit
//   5. Report    → top 5 conditions + standing advice + disclaimer
// ============================================================

import { CONDITIONS, ConditionKey, ConditionPrediction } from "./conditions";

export type SeverityLevel = "HIGH" | "MODERATE" | "MILD";
export type DurationClass = "PROLONGED" | "MODERATE" | "ACUTE";

export interface PredictionInput {
  symptoms: string;
  duration: string;
  severity: string;
  additionalInfo?: string;
}

export interface SymptomAnalysis {
  severityLevel: SeverityLevel;
  durationClass: DurationClass;
  predictions: ConditionPrediction[];
}

export const MAX_REPORTED_CONDITIONS = 5;

const includesAny = (text: string, terms: string[]): boolean =>
  terms.some((term) => text.includes(term));

// ── Severity ────────────────────────────────────────────────

/**
 * The numeric score in a severity description, if any.
 * "7/10 pain" → 7, "about an 8" → 8, "moderate" → undefined.
 */
export const extractSeverityScore = (severity: string): number | undefined => {
  const fraction = severity.match(/(\d+(?:\.\d+)?)\s*\/\s*10\b/);
  if (fraction) return Number(fraction[1]);

  const standalone = severity.match(/\b(\d+(?:\.\d+)?)\b/);
  return standalone ? Number(standalone[1]) : undefined;
};

const inRange = (score: number | undefined, min: number, max: number): boolean =>
  score !== undefined && score >= min && score <= max;

/**
 * Words win over numbers. Scores count only on the 0-10 scale:
 * 9-10 is HIGH, 6 up to 9 is MODERATE, anything else is MILD.
 */
export const classifySeverity = (severity: string): SeverityLevel => {
  const text = severity.toLowerCase();
  const score = extractSeverityScore(text);

  if (includesAny(text, ["severe", "worst", "unbearable"])) return "HIGH";
  if (inRange(score, 9, 10)) return "HIGH";
  if (includesAny(text, ["moderate", "significant"])) return "MODERATE";
  if (score !== undefined && score >= 6 && score < 9) return "MODERATE";
  return "MILD";
};

// ── Duration ────────────────────────────────────────────────

export const classifyDuration = (duration: string): DurationClass => {
  const text = duration.toLowerCase();
  if (includesAny(text, ["week", "month", "year", "chronic"])) return "PROLONGED";
  if (includesAny(text, ["days", "3 day", "4 day", "5 day"])) return "MODERATE";
  return "ACUTE";
};

// ── Matching Rules ──────────────────────────────────────────

interface SymptomContext {
  symptoms: string;
  additionalInfo: string;
  severityLevel: SeverityLevel;
}

interface ConditionRule {
  condition: ConditionKey;
  matches: (context: SymptomContext) => boolean;
}

const GI_TERMS = ["stomach", "nausea", "vomit", "diarrhea", "abdominal"];

// Order matters: it is the order conditions appear in the report
const RULES: ConditionRule[] = [
  {
    condition: "dengue",
    matches: ({ symptoms }) =>
      symptoms.includes("fever") &&
      includesAny(symptoms, ["headache behind eyes", "eye pain"]) &&
      includesAny(symptoms, ["nausea", "vomit"]),
  },
  {
    condition: "viralFever",
    matches: ({ symptoms }) =>
      symptoms.includes("fever") && includesAny(symptoms, ["body ache", "muscle"]),
  },
  {
    condition: "nonRespiratoryViral",
    matches: ({ symptoms }) =>
      symptoms.includes("fever") && !includesAny(symptoms, ["cough", "throat"]),
  },
  {
    condition: "migraine",
    matches: ({ symptoms }) =>
      symptoms.includes("headache") &&
      symptoms.includes("nausea") &&
      includesAny(symptoms, ["light", "sensitivity"]),
  },
  {
    condition: "meningitis",
    matches: ({ symptoms, severityLevel }) =>
      symptoms.includes("headache") && severityLevel === "HIGH" && symptoms.includes("sudden"),
  },
  {
    condition: "lowerRespiratory",
    matches: ({ symptoms }) => symptoms.includes("cough") && symptoms.includes("fever"),
  },
  {
    condition: "postViralCough",
    matches: ({ symptoms }) => symptoms.includes("cough") && !symptoms.includes("fever"),
  },
  {
    condition: "foodPoisoning",
    matches: ({ symptoms, additionalInfo }) =>
      includesAny(symptoms, GI_TERMS) &&
      (additionalInfo.includes("seafood") || symptoms.includes("food")),
  },
];

/**
 * Every condition whose rule matches, in rule order.
 * Never empty: falls back to an undifferentiated viral illness.
 */
export const matchConditions = (
  symptoms: string,
  severityLevel: SeverityLevel,
  additionalInfo = ""
): ConditionPrediction[] => {
  const context: SymptomContext = {
    symptoms: symptoms.toLowerCase(),
    additionalInfo: additionalInfo.toLowerCase(),
    severityLevel,
  };

  const matched = RULES.filter((rule) => rule.matches(context)).map(
    (rule) => CONDITIONS[rule.condition]
  );

  return matched.length > 0 ? matched : [CONDITIONS.undifferentiatedViral];
};

export const analyzeSymptoms = (input: PredictionInput): SymptomAnalysis => {
  const severityLevel = classifySeverity(input.severity);
  return {
    severityLevel,
    durationClass: classifyDuration(input.duration),
    predictions: matchConditions(input.symptoms, severityLevel, input.additionalInfo),
  };
};

// ── Report ──────────────────────────────────────────────────

export const riskMarker = (risk: string): string => {
  if (risk.includes("HIGH")) return "🚨";
  if (risk.includes("MODERATE")) return "⚠️";
  return "ℹ️";
};

const renderCondition = (prediction: ConditionPrediction, rank: number): string[] => [
  `**${rank}. ${prediction.condition}**`,
  `${riskMarker(prediction.risk)} Probability: ${prediction.probability} | Risk Level: ${prediction.risk}`,
  "",
  "📝 **Why this diagnosis:**",
  prediction.reasoning,
  "",
  "🧪 **Recommended Tests:**",
  prediction.tests,
  "",
  "✅ **What You Should Do:**",
  ...prediction.actions.map((action) => `• ${action}`),
];

const renderGeneralAdvice = (followUpDays: number): string[] => [
  "💡 **General Recommendations:**",
  "",
  "✅ **Immediate Steps:**",
  "• Continue monitoring temperature every 4-6 hours",
  "• Maintain fluid intake (2-3 liters/day minimum)",
  "• Get adequate rest (8+ hours sleep)",
  "• Keep symptom diary (helps doctor assessment)",
  "",
  "🏥 **When to See a Doctor:**",
  `• Symptoms persist beyond ${followUpDays} ${followUpDays === 1 ? "day" : "days"} without improvement`,
  "• Fever >103°F (39.4°C) or persistent fever",
  "• Development of new concerning symptoms",
  "• Unable to keep fluids down",
  "• Severe weakness or confusion",
  "",
  "🚨 **SEEK EMERGENCY CARE IF:**",
  "• Difficulty breathing or chest pain",
  "• Severe headache with neck stiffness",
  "• Persistent vomiting leading to dehydration",
  "• Altered mental status or confusion",
  "• Symptoms of internal bleeding",
  "• Fever with rash that doesn't blanch",
  "",
  "---",
  "",
  "⚠️ **Important Disclaimer:**",
  "This is an AI-assisted prediction based on symptom patterns. It is NOT a definitive diagnosis. Only a healthcare professional can provide accurate diagnosis after proper examination and tests. If in doubt, always consult a doctor.",
  "",
  "📞 **Need Human Medical Advice?** Contact your healthcare provider or visit nearest clinic/hospital.",
];

/**
 * Build the markdown report the disease_prediction tool returns.
 */
export const buildPredictionReport = (input: PredictionInput): string => {
  const { severityLevel, durationClass, predictions } = analyzeSymptoms(input);

  const lines: string[] = [
    "🔬 **DISEASE PREDICTION ANALYSIS**",
    "",
    "📋 **Symptoms Summary:**",
    `• Primary: ${input.symptoms}`,
    `• Duration: ${input.duration} (${durationClass})`,
    `• Severity: ${input.severity} (${severityLevel} risk)`,
  ];
  if (input.additionalInfo) {
    lines.push(`• Additional: ${input.additionalInfo}`);
  }
  lines.push("", "---", "", "🎯 **Most Likely Conditions:**");

  predictions.slice(0, MAX_REPORTED_CONDITIONS).forEach((prediction, i) => {
    lines.push("", ...renderCondition(prediction, i + 1));
  });

  lines.push("", "---", "", ...renderGeneralAdvice(durationClass === "ACUTE" ? 3 : 1));
  return lines.join("\n");
};
