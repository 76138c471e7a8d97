import axios, { AxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface StubResponse {
  status: number;
  data: unknown;
}

/** Axios instance whose requests are answered in process by `respond`. */
export function stubAxios(
  respond: (config: InternalAxiosRequestConfig) => StubResponse,
  baseURL?: string
): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL,
    adapter: async config => {
      requests.push(config);
      const { status, data } = respond(config);
      const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
      if (config.validateStatus && !config.validateStatus(status)) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
      }
      return response;
    }
  });
  return { http, requests };
}
