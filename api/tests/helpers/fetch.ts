/**
 * Recording fetch stand-in for the real repository backends
 */

export interface RecordedRequest {
  url: string;
  init: RequestInit | undefined;
}

export function createFetchMock(
  handler: (request: RecordedRequest) => Response | Promise<Response>,
) {
  const requests: RecordedRequest[] = [];

  const fetchMock: typeof globalThis.fetch = async (input, init) => {
    const request: RecordedRequest = { url: requestUrl(input), init };
    requests.push(request);
    return handler(request);
  };

  return { fetchMock, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function requestBody(request: RecordedRequest | undefined): unknown {
  const body = request?.init?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

export function requestHeader(request: RecordedRequest | undefined, name: string): string | null {
  return new Headers(request?.init?.headers).get(name);
}

function requestUrl(input: RequestInfo | URL): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}
