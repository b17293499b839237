import { tryGetUserId } from "../context/user-context.js";
import { StravaApiError } from "../strava/client.js";

/**
 * Standard prefix injected into every tool description so the LLM
 * always has app context regardless of which tool it reads first.
 */
export const APP_CONTEXT = `[Run Coach: running coach memory and Strava training data.
At the start of a coaching conversation call get_coaching_context and adopt the coaching persona it returns.
All tools return JSON. Dates are YYYY-MM-DD.]

`;

export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

/**
 * Build tool responses: full JSON in content (the model reads it directly).
 */
export function toolResponse(data: Record<string, unknown>, isError?: boolean): ToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data) }],
    ...(isError ? { isError: true } : {}),
  };
}

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/**
 * Classifies an error and returns a user-friendly message.
 * Tells the caller whether to retry, fix their input, or report a bug.
 */
export function classifyError(err: unknown): { message: string; retryable: boolean } {
  if (!(err instanceof Error)) {
    return { message: "An unexpected error occurred. Please try again.", retryable: true };
  }

  // Strava API errors
  if (err instanceof StravaApiError) {
    if (err.status === 401 || err.status === 403) {
      return { message: "Strava rejected the credentials. Check the STRAVA_* settings.", retryable: false };
    }
    if (err.status === 404) {
      return { message: "Activity not found on Strava.", retryable: false };
    }
    if (err.status === 429) {
      return { message: "Strava rate limit reached. Try again in a few minutes.", retryable: true };
    }
    return { message: `Strava request failed (${err.status}).`, retryable: err.status >= 500 };
  }

  const msg = err.message.toLowerCase();
  const code = errorCode(err);

  // Database errors
  if (code === "23505") {
    return { message: "A duplicate entry already exists.", retryable: false };
  }
  if (code === "23503") {
    return { message: "Referenced record not found.", retryable: false };
  }
  if (code === "23502") {
    return { message: "Required field is missing.", retryable: false };
  }
  if (err.name === "TimeoutError" || msg.includes("timeout") || msg.includes("timed out")) {
    return { message: "The operation timed out. Please try again.", retryable: true };
  }
  if (msg.includes("connection") || msg.includes("econnrefused") || msg.includes("enotfound") || msg.includes("fetch failed")) {
    return { message: "Connection error. Please try again in a moment.", retryable: true };
  }

  // Validation errors
  if (msg.includes("invalid") || msg.includes("must be") || msg.includes("required")) {
    return { message: err.message, retryable: false };
  }

  return { message: "Something went wrong. Please try again.", retryable: true };
}

/**
 * Wraps a tool handler with try/catch error handling.
 * Unexpected errors become a structured error response instead of
 * propagating to the MCP framework, which reports them opaquely.
 */
export function safeHandler<T>(
  toolName: string,
  handler: (params: T) => Promise<ToolResult>
): (params: T) => Promise<ToolResult> {
  return async (params: T) => {
    try {
      return await handler(params);
    } catch (err) {
      console.error(
        `[${toolName}] Unhandled error (user ${tryGetUserId() ?? "?"}):`,
        err instanceof Error ? err.stack : err,
      );
      const { message, retryable } = classifyError(err);
      return toolResponse({ error: message, retryable }, true);
    }
  };
}
