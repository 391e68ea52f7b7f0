import axios, { AxiosInstance } from 'axios';
import { config } from '../config';

/**
 * Creates the axios instance shared by the metadata, subtitle and video stages
 */
export function createHttpClient(
  options: { timeoutMs?: number; userAgent?: string } = {}
): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs ?? config.httpTimeoutMs,
    headers: {
      'User-Agent': options.userAgent ?? config.userAgent,
    },
  });
}

export const httpClient = createHttpClient();
