import { logger } from "../logger";

export interface RequestOptions {
  url: string;
  timeoutMs: number;
  method?: "GET" | "POST";
  body?: unknown;
  headers?: Record<string, string>;
}

export interface FetchResult<T> {
  data: T | null;
  success: boolean;
  error?: string;
  responseTimeMs: number;
  statusCode?: number;
}

const USER_AGENT = "HarvestWatch/1.0";

async function request<T>(
  options: RequestOptions,
  read: (response: Response) => Promise<T>,
): Promise<FetchResult<T>> {
  const { url, timeoutMs, method = "GET", body, headers = {} } = options;
  const startTime = Date.now();
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method,
      signal: controller.signal,
      headers: {
        Accept: "application/json",
        "User-Agent": USER_AGENT,
        ...(body !== undefined ? { "Content-Type": "application/json" } : {}),
        ...headers,
      },
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!response.ok) {
      return {
        data: null,
        success: false,
        error: `HTTP ${response.status}: ${response.statusText}`,
        responseTimeMs: Date.now() - startTime,
        statusCode: response.status,
      };
    }

    // Timeout also covers the body read
    const data = await read(response);

    return {
      data,
      success: true,
      responseTimeMs: Date.now() - startTime,
      statusCode: response.status,
    };
  } catch (error) {
    const isAbort = error instanceof Error && error.name === "AbortError";
    const message = isAbort ? `Timeout after ${timeoutMs}ms` : String(error);
    logger.warn(`Request to ${url} failed: ${message}`);

    return {
      data: null,
      success: false,
      error: message,
      responseTimeMs: Date.now() - startTime,
    };
  } finally {
    clearTimeout(timeout);
  }
}

export function fetchJson(options: RequestOptions): Promise<FetchResult<unknown>> {
  return request<unknown>(options, (response) => response.json());
}

export function fetchText(options: RequestOptions): Promise<FetchResult<string>> {
  return request(options, (response) => response.text());
}
