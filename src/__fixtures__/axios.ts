import {
  AxiosAdapter,
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from "axios";

export type FakeReply =
  | { status: number; data: unknown }
  | { timeout: true }
  | { networkError: string };

/**
 * Adapter that answers requests from a queue of canned replies, repeating the
 * last one once the queue runs dry, and records every request it sees.
 */
export function queuedAdapter(replies: FakeReply[]): {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  let next = 0;

  const adapter: AxiosAdapter = async (requestConfig) => {
    requests.push(requestConfig);
    const reply = replies[Math.min(next, replies.length - 1)];
    next++;

    if ("timeout" in reply) {
      throw new AxiosError("timeout exceeded", "ECONNABORTED", requestConfig);
    }
    if ("networkError" in reply) {
      throw new AxiosError("socket hang up", reply.networkError, requestConfig);
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config: requestConfig,
    };
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        reply.status >= 500 ? "ERR_BAD_RESPONSE" : "ERR_BAD_REQUEST",
        requestConfig,
        undefined,
        response
      );
    }
    return response;
  };

  return { adapter, requests };
}
