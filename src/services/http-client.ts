import axios, { AxiosAdapter, AxiosInstance } from "axios";
import logger from "../utils/logger";

export interface HttpClientOptions {
  /** Names the upstream service in log lines. */
  service: string;
  baseURL?: string;
  timeout: number;
  headers?: Record<string, string>;
  adapter?: AxiosAdapter;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const instance = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout,
    headers: {
      "User-Agent": "TTAB-Opposition-Scraper/1.0",
      ...options.headers,
    },
    adapter: options.adapter,
  });

  instance.interceptors.request.use(
    (requestConfig) => {
      logger.debug(`${options.service} request`, {
        action: "http_request",
        url: requestConfig.url,
        method: requestConfig.method,
      });
      return requestConfig;
    },
    (error: unknown) => {
      if (error instanceof Error) {
        logger.error(`${options.service} request error`, error);
      }
      return Promise.reject(error);
    }
  );

  instance.interceptors.response.use(
    (response) => {
      logger.debug(`${options.service} response received`, {
        action: "http_response",
        status: response.status,
        url: response.config.url,
      });
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        if (error.response) {
          logger.warn(`${options.service} error response`, {
            status: error.response.status,
            statusText: error.response.statusText,
            url: error.config?.url,
          });
        } else {
          logger.warn(`${options.service} network error`, {
            status: error.code,
            url: error.config?.url,
          });
        }
      }
      return Promise.reject(error);
    }
  );

  return instance;
}

export const isAxiosTimeout = (error: unknown): boolean =>
  axios.isAxiosError(error) &&
  (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT");

/** Timeouts, dropped connections and 5xx responses. */
export function isRetryableHttpError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  if (error.response) return error.response.status >= 500;
  return error.code !== "ERR_CANCELED";
}

/** `timeout`, `http_<status>`, or the error kind. */
export function describeHttpError(error: unknown): string {
  if (isAxiosTimeout(error)) return "timeout";
  if (axios.isAxiosError(error)) {
    if (error.response) return `http_${error.response.status}`;
    return error.code ?? error.name;
  }
  return error instanceof Error ? error.name : "UnknownError";
}
