// ============================================================
// Server-Sent Events helpers
// ============================================================
// SSE protocol: every event is "data: <payload>\n\n".
// The browser's EventSource (or a fetch reader) splits on the
// blank line and JSON-parses the payload.
// ============================================================

import { Response } from "express";
import { StreamEvent } from "../types";

export const formatSseEvent = (event: StreamEvent): string => `data: ${JSON.stringify(event)}\n\n`;

/**
 * Switch a response into event-stream mode and send the headers now.
 */
export const openEventStream = (res: Response): void => {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering
  res.flushHeaders();
};
