import axios, {
  AxiosError,
  AxiosHeaders,
  CanceledError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";

export interface StubResponse {
  status?: number;
  data: unknown;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubResponse | Promise<StubResponse>;

/**
 * Axios instance answered in process by `handler`. Statuses of 400 and above
 * reject the way a real request would.
 */
export function stubHttp(handler: StubHandler): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      if (config.signal?.aborted) {
        throw new CanceledError();
      }
      const { status = 200, data } = await handler(config);
      const response: AxiosResponse = {
        data,
        status,
        statusText: String(status),
        headers: new AxiosHeaders(),
        config,
      };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
      }
      return response;
    },
  });
  return { http, requests };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
