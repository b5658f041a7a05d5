// ── disease_prediction ──────────────────────────────────────
// Exposes the symptom heuristic to the model. The system prompt
// tells the model to gather symptoms, duration and severity over
// a few exchanges before calling this.

import { z } from "zod";
import { getErrorMessage, preview } from "../../utils/errors";
import { buildPredictionReport } from "../prediction/prediction.service";
import { AgentTool, defineTool } from "./tool";

export const predictionFailure = (message: string): string =>
  `⚠️ Unable to perform disease prediction analysis at this time. Error: ${message}\n\nPlease consult with a healthcare professional for proper diagnosis.`;

export const createDiseasePredictionTool = (
  analyze: typeof buildPredictionReport = buildPredictionReport
): AgentTool =>
  defineTool({
    name: "disease_prediction",
    description:
      "🔬 Analyze symptoms and predict the most likely medical conditions with a risk assessment. " +
      "Use it once you know the primary symptoms, their duration and their severity (usually after 2-3 exchanges). " +
      "Returns up to 5 likely conditions with probability, risk level, recommended tests, next steps and when to seek immediate care.",
    activity: "🔬 Analyzing symptoms...",
    parameters: {
      symptoms: { description: 'Main symptoms, e.g. "fever, headache behind eyes, body aches, nausea"' },
      duration: { description: 'How long symptoms have lasted, e.g. "2 days", "1 week"' },
      severity: { description: 'Intensity, e.g. "moderate", "severe", "7/10 pain"' },
      additional_info: {
        description:
          'Contact history, medications tried, absent symptoms, e.g. "colleague had viral fever, took paracetamol, no cough"',
        required: false,
      },
    },
    schema: z.object({
      symptoms: z.string().min(1),
      duration: z.string(),
      severity: z.string(),
      additional_info: z.string().optional().default(""),
    }),
    handler: async ({ symptoms, duration, severity, additional_info }) => {
      try {
        console.log(`[Tools] Analyzing symptoms for disease prediction: ${preview(symptoms)}`);
        const report = analyze({ symptoms, duration, severity, additionalInfo: additional_info });
        console.log("[Tools] Disease prediction analysis completed");
        return report;
      } catch (error) {
        const message = getErrorMessage(error);
        console.error(`[Tools] Disease prediction failed: ${message}`);
        return predictionFailure(message);
      }
    },
  });
