/**
 * Minimal HTTP GET used by readiness probes, health checks and
 * verification strategies. One connection per request (`agent: false`).
 */

import * as http from 'node:http';

export interface HttpResponse {
  status: number;
  body: string;
}

/** Maximum response body retained for diagnostics. */
export const MAX_BODY_BYTES = 64 * 1024;

/**
 * Issue a GET and resolve with the status and body, whatever the status.
 * Transport errors and aborts reject.
 */
export function httpGet(url: string, signal?: AbortSignal): Promise<HttpResponse> {
  return new Promise<HttpResponse>((resolve, reject) => {
    const req = http.get(url, { agent: false, signal }, (res) => {
      let body = '';
      res.setEncoding('utf-8');
      res.on('data', (chunk: string) => {
        if (body.length < MAX_BODY_BYTES) {
          body += chunk;
        }
      });
      res.on('end', () => resolve({ status: res.statusCode ?? 0, body }));
      res.on('error', reject);
    });
    req.on('error', reject);
  });
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/** GET `url` and reject unless the status is 2xx. */
export async function expectSuccess(url: string, signal?: AbortSignal): Promise<HttpResponse> {
  const res = await httpGet(url, signal);
  if (!isSuccess(res.status)) {
    throw new Error(`GET ${url} returned ${res.status}`);
  }
  return res;
}

/** GET `url`, require a 2xx status, and parse the body as JSON. */
export async function getJson(url: string, signal?: AbortSignal): Promise<unknown> {
  const res = await expectSuccess(url, signal);
  try {
    return JSON.parse(res.body);
  } catch (err) {
    throw new Error(`GET ${url} returned invalid JSON`, { cause: err });
  }
}
