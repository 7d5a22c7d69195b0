import axios, { AxiosInstance } from 'axios';

/**
 * The slice of axios the portal client and robots policy depend on
 */
export type HttpTransport = Pick<AxiosInstance, 'request'>;

export function createHttpTransport(timeoutMs: number): HttpTransport {
  return axios.create({
    timeout: timeoutMs,
    responseType: 'text',
    maxRedirects: 5,
    // Status handling belongs to the caller
    validateStatus: () => true
  });
}
