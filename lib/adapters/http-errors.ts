import axios from "axios";
import { ServerError } from "../domain/errors.ts";

/** HTTP status of an axios error, if any. */
export function statusOf(err: unknown): number | undefined {
  return axios.isAxiosError(err) ? err.response?.status : undefined;
}

function serverMessage(data: unknown): string | undefined {
  if (typeof data === "string") return data.trim() ? data.trim().slice(0, 200) : undefined;
  if (data && typeof data === "object") {
    if ("errors" in data && Array.isArray(data.errors) && data.errors.length > 0) {
      return data.errors.map(String).join("; ");
    }
    if ("message" in data && typeof data.message === "string") return data.message;
  }
  return undefined;
}

export function explainAxios(err: unknown, context?: string): ServerError {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const statusText = err.response?.statusText;
    const msg = serverMessage(err.response?.data) || err.message || "Axios error";
    const more = status ? ` (HTTP ${status}${statusText ? " " + statusText : ""})` : "";
    return new ServerError(`${context ?? "HTTP error"}: ${msg}${more}`.trim(), { cause: err, status });
  }
  if (err instanceof Error) {
    return new ServerError(`${context ?? "HTTP error"}: ${err.message}`.trim(), { cause: err });
  }
  return new ServerError(`${context ?? "HTTP error"}: ${String(err)}`.trim(), { cause: err });
}
