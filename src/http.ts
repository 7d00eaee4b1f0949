/**
 * Shared axios setup for both trackers
 */

import axios, { AxiosInstance } from 'axios';
import { CONSTANTS } from './constants';
import { TransientAPIError } from './errors';

export type Service = TransientAPIError['service'];

export interface HttpCredentials {
  baseUrl: string;
  username: string;
  password: string;
}

export function createHttpClient(credentials: HttpCredentials): AxiosInstance {
  return axios.create({
    baseURL: credentials.baseUrl.replace(/\/$/, ''),
    timeout: CONSTANTS.HTTP_TIMEOUT_MS,
    auth: { username: credentials.username, password: credentials.password },
    headers: {
      'Accept': 'application/json',
      'User-Agent': CONSTANTS.USER_AGENT,
    },
  });
}

/**
 * Wrap whatever the request threw as a TransientAPIError carrying the
 * service, the call and, when the server answered, its status and body.
 */
export function toTransientError(error: unknown, service: Service, call: string): TransientAPIError {
  if (error instanceof TransientAPIError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      const body = typeof error.response?.data === 'string'
        ? error.response.data
        : JSON.stringify(error.response?.data ?? '');
      return new TransientAPIError(`${service} ${status} on ${call}: ${body.slice(0, 500)}`, service, status);
    }
    return new TransientAPIError(`${service} request ${call} failed: ${error.message}`, service);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransientAPIError(`${service} request ${call} failed: ${message}`, service);
}
