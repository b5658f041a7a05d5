// ============================================================
// Condition Catalog
// ============================================================
// The canned write-up for every condition the symptom heuristic
// can report. The matching rules live in prediction.service.ts;
// this file is only the text each rule emits.
// ============================================================

export interface ConditionPrediction {
  condition: string;
  probability: string;
  risk: string;
  reasoning: string;
  tests: string;
  actions: string[];
}

export type ConditionKey =
  | "dengue"
  | "viralFever"
  | "nonRespiratoryViral"
  | "migraine"
  | "meningitis"
  | "lowerRespiratory"
  | "postViralCough"
  | "foodPoisoning"
  | "undifferentiatedViral";

export const CONDITIONS: Record<ConditionKey, ConditionPrediction> = {
  dengue: {
    condition: "Dengue Fever",
    probability: "HIGH (75-85%)",
    risk: "MODERATE-HIGH",
    reasoning:
      "Classic triad: fever + retro-orbital headache + nausea. Contact history supports viral transmission.",
    tests: "Complete Blood Count (CBC), Dengue NS1 antigen, IgM/IgG antibodies",
    actions: [
      "See doctor within 24 hours",
      "Monitor platelet count",
      "Hydrate aggressively",
      "Avoid NSAIDs (aspirin/ibuprofen)",
    ],
  },
  viralFever: {
    condition: "Viral Fever (Influenza/Common Viral Infection)",
    probability: "HIGH (70-80%)",
    risk: "MODERATE",
    reasoning:
      "Fever + body aches + systemic symptoms. Contact with sick colleague increases likelihood.",
    tests: "Usually clinical diagnosis, Rapid Flu test if severe",
    actions: [
      "Rest and hydration",
      "Paracetamol for fever",
      "Monitor for 48-72 hours",
      "See doctor if worsening",
    ],
  },
  nonRespiratoryViral: {
    condition: "Non-Respiratory Viral Infection",
    probability: "MODERATE (60-70%)",
    risk: "LOW-MODERATE",
    reasoning:
      "Systemic symptoms without respiratory signs suggest non-respiratory viral infection.",
    tests: "CBC, CRP (inflammatory markers)",
    actions: ["Symptomatic treatment", "Monitor temperature", "Seek care if fever >3 days"],
  },
  migraine: {
    condition: "Migraine",
    probability: "HIGH (70-85%)",
    risk: "MODERATE",
    reasoning: "Headache + photophobia + nausea = classic migraine triad.",
    tests: "Clinical diagnosis, imaging if red flags present",
    actions: [
      "Dark, quiet room",
      "Triptans or NSAIDs (if appropriate)",
      "Antiemetics for nausea",
      "Avoid triggers",
    ],
  },
  meningitis: {
    condition: "⚠️ SERIOUS: Possible Meningitis/Intracranial Issue",
    probability: "LOW-MODERATE (15-30%)",
    risk: "🚨 VERY HIGH",
    reasoning: "Severe headache + fever + nausea can indicate serious infection.",
    tests: "URGENT: CT scan, Lumbar puncture",
    actions: [
      "🚨 SEEK EMERGENCY CARE IMMEDIATELY",
      "Do NOT delay",
      "Check for neck stiffness, confusion",
    ],
  },
  lowerRespiratory: {
    condition: "Lower Respiratory Tract Infection (Bronchitis/Pneumonia)",
    probability: "MODERATE-HIGH (60-75%)",
    risk: "MODERATE-HIGH",
    reasoning: "Productive cough + fever suggests bacterial or viral LRTI.",
    tests: "Chest X-ray, Sputum culture",
    actions: ["See doctor for evaluation", "May need antibiotics", "Monitor breathing", "Hydration"],
  },
  postViralCough: {
    condition: "Post-Viral Cough / Upper Respiratory Infection",
    probability: "HIGH (70-80%)",
    risk: "LOW",
    reasoning: "Isolated cough without fever often post-viral.",
    tests: "Usually none needed",
    actions: ["Honey, steam inhalation", "OTC cough suppressants", "See doctor if >2 weeks"],
  },
  foodPoisoning: {
    condition: "Food Poisoning / Gastroenteritis",
    probability: "HIGH (75-85%)",
    risk: "MODERATE",
    reasoning: "Recent seafood consumption + GI symptoms = likely food poisoning.",
    tests: "Stool culture if severe",
    actions: [
      "Aggressive hydration (ORS)",
      "BRAT diet",
      "Avoid dairy temporarily",
      "See doctor if bloody stool/high fever",
    ],
  },
  undifferentiatedViral: {
    condition: "Undifferentiated Viral Illness",
    probability: "MODERATE (50-70%)",
    risk: "MODERATE",
    reasoning:
      "Symptoms suggest viral infection but pattern unclear. Needs more clinical evaluation.",
    tests: "CBC, CRP, viral panel if indicated",
    actions: ["Symptomatic management", "Medical evaluation recommended", "Monitor closely"],
  },
};
