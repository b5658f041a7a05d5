// ============================================================
// Chat Routes — URL-to-Handler Mapping
// ============================================================
// This file defines ALL chat-related API endpoints.
//
// ROUTE DEFINITIONS:
//   POST   /chat                      → Ask the assistant (JSON reply)
//   POST   /chat/stream               → Ask the assistant (SSE reply)
//   GET    /conversation/:sessionId   → Session history
//   DELETE /conversation/:sessionId   → Clear session history
//
// MIDDLEWARE CHAIN:
//   POST requests go through:
//   1. express.json() (in app.ts) → Parse the JSON body
//   2. chatLimiter → 20 messages per minute per IP
//   3. controller → Handle the request
//   Bad JSON or a blank message end in errorHandler with a 400.
//
// RATE LIMITING:
//   Only the two POST routes are limited. Each message costs one
//   or more Gemini calls plus embedding, Pinecone and web search
//   requests. History reads are a lookup in MongoDB or memory.
//
// The limiter is passed in rather than imported: express-rate-limit
// keeps its counters per instance, so each app gets its own.
// ============================================================

import { RequestHandler, Router } from "express";
import * as chatController from "./chat.controller";

export const createChatRouter = (chatLimiter: RequestHandler): Router => {
  const router = Router();

  // ── Messages ──────────────────────────────────────────────
  // POST body: { message: "hello", sessionId?: "abc" }
  router.post("/chat", chatLimiter, chatController.sendMessage); // JSON reply
  router.post("/chat/stream", chatLimiter, chatController.streamMessage); // SSE reply

  // ── Conversation History ──────────────────────────────────
  router.get("/conversation/:sessionId", chatController.getHistory); // Read history
  router.delete("/conversation/:sessionId", chatController.clearHistory); // Clear history

  return router;
};
