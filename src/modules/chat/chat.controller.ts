// ============================================================
// Chat Controller — HTTP Request Handlers
// ============================================================
// This controller handles ALL chat-related HTTP requests.
// Every handler follows the same pattern:
//   1. Extract data from the request (params, body)
//   2. Call the service layer
//   3. Send the HTTP response
//
// IMPORTANT CONCEPTS:
//
// req.app.locals.chatService — The ChatService for this app
//   createApp() stores the service on app.locals before mounting
//   the routes, so the handlers below can stay plain module-level
//   functions. getChatService() reads it back and checks its type.
//
// req.body.sessionId — Which conversation the message belongs to
//   Optional. Without one, everything goes to "default_session",
//   a single shared conversation, which is what the bundled web
//   page uses.
//
// req.params.sessionId — The session ID from the URL
//   For routes like /conversation/:sessionId, Express extracts
//   ":sessionId" and puts it in req.params.sessionId.
//
// VALIDATION ERRORS:
//   A missing or blank message becomes an HttpError(400) passed to
//   next(). The error middleware turns it into
//   { success: false, message: "Message cannot be empty" }.
//
// ERROR HANDLING WITH SSE:
//   POST /chat/stream switches the response to text/event-stream
//   BEFORE the agent runs. After that the headers are already sent
//   (res.headersSent = true), so a failure cannot become a JSON
//   error response. The service sends it AS an SSE event instead:
//   data: {"type":"error","message":"..."}\n\n
// ============================================================

import { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { HttpError, getErrorMessage } from "../../utils/errors";
import { formatSseEvent, openEventStream } from "../../utils/sse";
import { ChatService, DEFAULT_SESSION_ID } from "./chat.service";

const chatBodySchema = z.object({
  message: z.string().trim().min(1),
  sessionId: z.string().trim().min(1).max(200).optional(),
});

type ChatBody = z.infer<typeof chatBodySchema>;

export const getChatService = (req: Request): ChatService => {
  const service: unknown = req.app.locals.chatService;
  if (!(service instanceof ChatService)) {
    throw new Error("No ChatService registered on app.locals.chatService");
  }
  return service;
};

/**
 * Validate the body of POST /chat and POST /chat/stream.
 * Throws HttpError(400) when the message is missing or blank.
 */
const readChatBody = (req: Request): ChatBody => {
  const parsed = chatBodySchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    throw new HttpError(400, "Message cannot be empty");
  }
  return parsed.data;
};

// ── Message Handlers ────────────────────────────────────────

/**
 * POST /chat
 * Send a message and wait for the complete reply.
 *
 * Request body: { message: "What causes migraines?", sessionId?: "abc" }
 * Response (200): { response, response_html, timestamp, processing_time, tools_used }
 */
export const sendMessage = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const body = readChatBody(req);
    const reply = await getChatService(req).sendMessage(body.sessionId ?? DEFAULT_SESSION_ID, body.message);
    res.status(200).json(reply);
  } catch (error) {
    next(error);
  }
};

/**
 * POST /chat/stream
 * Same body as /chat. The response is an SSE stream:
 *   start → tool_start / tool_end ... → response_start
 *   → content ... → complete → end
 */
export const streamMessage = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  let body: ChatBody;
  let chatService: ChatService;
  try {
    body = readChatBody(req);
    chatService = getChatService(req);
  } catch (error) {
    // Headers are not sent yet, so this can still be a JSON error
    next(error);
    return;
  }

  openEventStream(res);
  try {
    await chatService.streamMessage(body.sessionId ?? DEFAULT_SESSION_ID, body.message, (event) => {
      res.write(formatSseEvent(event));
    });
  } catch (error) {
    console.error(`[Chat] Stream failed: ${getErrorMessage(error)}`);
  } finally {
    // ALWAYS close the SSE connection when done (success or error)
    res.end();
  }
};

// ── Conversation History Handlers ───────────────────────────

/**
 * GET /conversation/:sessionId
 * Response (200): { history: [...], total_messages: 3 }
 * Unknown session (200): { history: [] }
 */
export const getHistory = async (req: Request, res: Response): Promise<void> => {
  try {
    const history = await getChatService(req).getHistory(req.params.sessionId);
    if (!history) {
      res.status(200).json({ history: [] });
      return;
    }
    res.status(200).json({ history, total_messages: history.length });
  } catch (error) {
    console.error(`[Chat] Error retrieving conversation: ${getErrorMessage(error)}`);
    res.status(500).json({ success: false, message: "Error retrieving conversation history" });
  }
};

/**
 * DELETE /conversation/:sessionId
 * Response (200): { message: "Conversation history cleared for session: abc" }
 */
export const clearHistory = async (req: Request, res: Response): Promise<void> => {
  const { sessionId } = req.params;
  try {
    await getChatService(req).clearHistory(sessionId);
    res.status(200).json({ message: `Conversation history cleared for session: ${sessionId}` });
  } catch (error) {
    console.error(`[Chat] Error clearing conversation: ${getErrorMessage(error)}`);
    res.status(500).json({ success: false, message: "Error clearing conversation history" });
  }
};
