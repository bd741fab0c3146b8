/**
 * Bounded HTTP requests for readiness probes and health checks
 */

import { extractErrorMessage } from './errors';

export interface ProbeOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

export type ProbeResult =
  | { reachable: true; status: number; body: string }
  | { reachable: false; error: string };

/**
 * GET a URL without following redirects. Network errors and timeouts are reported as
 * unreachable rather than thrown.
 */
export async function probeHttp(url: string, options: ProbeOptions): Promise<ProbeResult> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'GET',
      redirect: 'manual',
      signal: controller.signal,
      headers: {
        'User-Agent': 'container-testkit-probe',
        ...options.headers,
      },
    });
    const body = await response.text();
    return { reachable: true, status: response.status, body };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      return { reachable: false, error: `request timed out after ${options.timeoutMs}ms` };
    }
    return { reachable: false, error: extractErrorMessage(error) };
  } finally {
    clearTimeout(timeoutId);
  }
}

export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}
