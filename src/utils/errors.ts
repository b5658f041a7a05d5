// ============================================================
// Error Helpers
// ============================================================
// Controllers and tools catch `unknown`; these helpers turn
// whatever was thrown into something we can log or send back.
// ============================================================

/**
 * Raised when a required environment variable is missing or invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * An error that already knows its HTTP status code.
 * The error middleware sends it back as { success: false, message }.
 */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
};

/** First 100 characters of user text, for log lines. */
export const preview = (text: string, max = 100): string =>
  text.length > max ? `${text.slice(0, max)}...` : text;
