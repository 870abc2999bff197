import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface StubCall {
  method: string;
  url: string;
  params: Record<string, unknown>;
  data: unknown;
}

export interface StubReply {
  status?: number;
  data: unknown;
}

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') return data;
  try {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  } catch {
    return data;
  }
}

/**
 * Axios instance whose requests never leave the process: each one is answered
 * by `handler` and recorded in `calls`.
 */
export function stubHttp(handler: (call: StubCall) => StubReply): { http: AxiosInstance; calls: StubCall[] } {
  const calls: StubCall[] = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const call: StubCall = {
        method: (config.method ?? 'get').toUpperCase(),
        url: `${config.baseURL ?? ''}${config.url ?? ''}`,
        params: { ...config.params },
        data: parseBody(config.data),
      };
      calls.push(call);

      const reply = handler(call);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status ?? 200,
        statusText: 'stub',
        headers: {},
        config,
      };
      if (response.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${response.status}`,
          AxiosError.ERR_BAD_REQUEST,
          config,
          null,
          response
        );
      }
      return response;
    },
  });

  return { http, calls };
}
