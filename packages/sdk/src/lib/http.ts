import Axios, { type AxiosInstance } from "axios";
import type { StatusFetcher } from "../types/status.js";

/**
 * Create the Axios instance used by one client
 */
export function createHttpInstance(baseURL: string, timeout: number): AxiosInstance {
  return Axios.create({
    baseURL,
    timeout,
    headers: {
      Accept: "application/json",
    },
  });
}

/**
 * Build the status fetcher handed to the poller.
 *
 * Every status code resolves and the body stays raw text, so the poller
 * alone decides what a 404 or a 500 means. Failures without a response
 * still reject through the instance's interceptors.
 */
export function createStatusFetcher(http: AxiosInstance): StatusFetcher {
  return async (path) => {
    const response = await http.get<string>(path, {
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });

    const body = response.data;
    return {
      status: response.status,
      body: typeof body === "string" && body.length > 0 ? body : undefined,
    };
  };
}
