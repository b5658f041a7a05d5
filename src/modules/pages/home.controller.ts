// ============================================================
// Home Page
// ============================================================
// GET / serves the chat UI from templates/index.html. When the
// template is missing (e.g. an API-only deployment) a small
// status page lists the endpoints instead.
// ============================================================

import { Request, Response } from "express";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { ASSISTANT_NAME } from "../agent/system.prompt";
import { getErrorMessage } from "../../utils/errors";

const escapeHtml = (text: string): string =>
  text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

const isMissingFile = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

export const statusPage = (): string => `<!DOCTYPE html>
<html>
  <head>
    <title>🏥 ${ASSISTANT_NAME}</title>
    <meta charset="UTF-8">
    <style>
      body { font-family: Arial, sans-serif; margin: 40px; background: #f5f5f5; }
      .container { max-width: 800px; margin: 0 auto; background: white; padding: 40px; border-radius: 10px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
      h1 { color: #2c5aa0; }
      .status { padding: 20px; background: #e8f5e8; border-radius: 5px; margin: 20px 0; }
    </style>
  </head>
  <body>
    <div class="container">
      <h1>🏥 ${ASSISTANT_NAME} Medical Assistant</h1>
      <div class="status">
        <h2>✅ API Status: Running</h2>
        <ul>
          <li><strong>Chat API:</strong> <code>POST /chat</code></li>
          <li><strong>Streaming Chat:</strong> <code>POST /chat/stream</code></li>
          <li><strong>Conversation History:</strong> <code>GET /conversation/:sessionId</code></li>
          <li><strong>Health Check:</strong> <a href="/health">GET /health</a></li>
        </ul>
      </div>
      <p><strong>Note:</strong> Frontend template not found. Place your HTML template in <code>templates/index.html</code></p>
    </div>
  </body>
</html>`;

export const errorPage = (message: string): string => `<!DOCTYPE html>
<html>
  <head><title>🏥 ${ASSISTANT_NAME} - Error</title><meta charset="UTF-8"></head>
  <body style="font-family: Arial, sans-serif; margin: 40px; background: #f5f5f5;">
    <div style="max-width: 600px; margin: 0 auto; background: white; padding: 40px; border-radius: 10px;">
      <h1 style="color: #d32f2f;">⚠️ ${ASSISTANT_NAME} Error</h1>
      <p>There was an error loading the application.</p>
      <p><strong>Error:</strong> ${escapeHtml(message)}</p>
    </div>
  </body>
</html>`;

export const createHomeController = (templatesDir: string) => async (_req: Request, res: Response) => {
  try {
    const html = await readFile(path.join(templatesDir, "index.html"), "utf-8");
    res.status(200).type("html").send(html);
  } catch (error) {
    if (isMissingFile(error)) {
      res.status(200).type("html").send(statusPage());
      return;
    }
    console.error(`[API] Error serving home page: ${getErrorMessage(error)}`);
    res.status(500).type("html").send(errorPage(getErrorMessage(error)));
  }
};
