// ============================================================
// Rate Limiter Middleware
// ============================================================
// Applied to the two chat endpoints. Each message means one or
// more Gemini calls plus embeddings, Pinecone and Brave requests.
//
// HOW IT WORKS:
//   1. Each request is tracked by the sender's IP address
//   2. A counter increments for each request within the window
//   3. Over `limit` → HTTP 429 (Too Many Requests)
//   4. After `windowMs` the counter resets
// ============================================================

import rateLimit from "express-rate-limit";

// ── Chat Rate Limiter ───────────────────────────────────────
// 20 messages per minute is generous for a human typing,
// but blocks automated scripts.
export const createChatLimiter = (limit = 20) =>
  rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute window
    limit, // max messages per window per IP
    message: {
      success: false,
      message: "Too many messages. Please wait a moment before sending more.",
    },
    standardHeaders: true, // Return rate limit info in RateLimit-* headers
    legacyHeaders: false, // Disable deprecated X-RateLimit-* headers
  });
