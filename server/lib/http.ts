import axios, { type AxiosInstance } from "axios";
import { TransportError, errorMessage } from "../services/errors";

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
}

/**
 * Shared HTTP session. Engines and providers add their own headers per request.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs,
    headers: {
      "User-Agent": options.userAgent,
    },
  });
}

/**
 * Wrap a request failure as a TransportError. Cancellations are returned
 * untouched so callers can tell them apart.
 */
export function toTransportError(target: string, error: unknown): unknown {
  if (axios.isCancel(error) || error instanceof TransportError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status ?? null;
    const detail = status !== null ? `HTTP ${status}` : error.code ?? error.message;
    return new TransportError(target, `request failed (${detail})`, { status, cause: error });
  }
  return new TransportError(target, errorMessage(error), { cause: error });
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  return axios.isCancel(error) || (signal?.aborted ?? false);
}
