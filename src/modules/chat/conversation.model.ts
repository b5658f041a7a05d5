// ============================================================
// Session Model (MongoDB Schema)
// ============================================================
// One document per chat session, holding its recent exchanges:
//
//   {
//     sessionId: "default_session",
//     exchanges: [
//       { userMessage, botResponse, timestamp, toolsUsed },
//       ...  (at most HISTORY_LIMIT, oldest first)
//     ]
//   }
//
// $push with $slice appends and trims in one update.
// ============================================================

import mongoose, { Schema } from "mongoose";
import { ConversationExchange } from "../../types";

export interface ISession {
  sessionId: string;
  exchanges: ConversationExchange[];
}

const exchangeSchema = new Schema(
  {
    userMessage: { type: String, required: true },
    botResponse: { type: String, required: true },
    timestamp: { type: Date, default: Date.now },
    toolsUsed: { type: [String], default: [] },
  },
  { _id: false } // exchanges are addressed by position, not id
);

const sessionSchema = new Schema(
  {
    sessionId: {
      type: String,
      required: true,
      unique: true, // also creates the index used by every lookup
      trim: true,
    },
    exchanges: {
      type: [exchangeSchema],
      default: [],
    },
  },
  // timestamps: true → auto-adds createdAt and updatedAt fields
  { timestamps: true }
);

export default mongoose.model<ISession>("Session", sessionSchema);
