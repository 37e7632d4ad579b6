import axios from "axios";

const TRANSIENT_HTTP_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_NETWORK",
]);

/** Network blips and 5xx/429 responses are worth another try; 4xx are not. */
export function isTransientHttpError(error: unknown): boolean {
  if (axios.isCancel(error)) return false;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) return TRANSIENT_HTTP_STATUSES.has(status);
    return error.code !== undefined && TRANSIENT_NETWORK_CODES.has(error.code);
  }

  if (error instanceof Error) {
    const code =
      "code" in error && typeof error.code === "string" ? error.code : undefined;
    if (code && TRANSIENT_NETWORK_CODES.has(code)) return true;
    const message = error.message.toLowerCase();
    return message.includes("socket hang up") || message.includes("network");
  }

  return false;
}

export function isCancellation(error: unknown): boolean {
  return (
    axios.isCancel(error) ||
    (error instanceof Error && error.name === "AbortError")
  );
}

export function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const target = error.config?.url ?? "request";
    return status !== undefined
      ? `${target} returned HTTP ${status}`
      : `${target} failed: ${error.code ?? error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
