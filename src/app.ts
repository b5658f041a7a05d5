// ============================================================
// App Factory — Express Server Setup
// ============================================================
// createApp() wires middleware and routes around a ready-made
// ChatService. It does NOT connect to anything or listen on a
// port: server.ts does that, and tests hand in stand-ins.
//
// MIDDLEWARE PIPELINE:
//   Request → [CORS] → [JSON Parser] → [Static] → [Routes]
//           → [404 Handler] → [Error Handler]
// ============================================================

import cors from "cors";
import express, { Express, RequestHandler } from "express";
import path from "node:path";
import { createChatLimiter } from "./middlewares/rateLimiter";
import { errorHandler, notFound } from "./middlewares/errorHandler";
import { createChatRouter } from "./modules/chat/chat.routes";
import { ChatService } from "./modules/chat/chat.service";
import { createHomeController } from "./modules/pages/home.controller";
import { HealthReport } from "./types";

export const APP_VERSION = "1.0.0";

export interface AppOptions {
  chatService: ChatService;
  allowedOrigins: string[];
  /** Service status lines for GET /health, computed per request. */
  healthServices: () => Record<string, string>;
  templatesDir?: string;
  staticDir?: string;
  chatLimiter?: RequestHandler;
}

export const createApp = (options: AppOptions): Express => {
  const app = express();

  // ── Global Middleware ────────────────────────────────────
  app.use(cors({ origin: options.allowedOrigins, credentials: true }));
  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: true }));

  // Assets for the bundled chat page
  app.use("/static", express.static(options.staticDir ?? path.resolve(process.cwd(), "static")));

  // ── Routes ───────────────────────────────────────────────
  app.get("/", createHomeController(options.templatesDir ?? path.resolve(process.cwd(), "templates")));

  // Used by monitoring tools, load balancers and Docker health checks
  app.get("/health", (_req, res) => {
    const report: HealthReport = {
      status: "🟢 Healthy",
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
      services: options.healthServices(),
    };
    res.status(200).json(report);
  });

  // Read by the chat handlers through getChatService(req)
  app.locals.chatService = options.chatService;
  app.use(createChatRouter(options.chatLimiter ?? createChatLimiter()));

  // ── Fallbacks (MUST be registered last) ──────────────────
  app.use(notFound);
  app.use(errorHandler);

  return app;
};
