import type { FetchLike } from './session.js';

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Headers;
  body: string | undefined;
};

export type FakeResponseInit = {
  status?: number;
  headers?: Record<string, string>;
  /** Value exposed as Response.url */
  url: string;
};

export type FakeRoute = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * Build a Response whose `url` is set, as a real fetch would after redirects
 */
export function fakeResponse(
  body: ConstructorParameters<typeof Response>[0],
  init: FakeResponseInit,
): Response {
  const response = new Response(body, { status: init.status ?? 200, headers: init.headers });
  Object.defineProperty(response, 'url', { value: init.url });
  return response;
}

/**
 * In-process stand-in for fetch: records every request and answers from `route`
 */
export function createFakeFetch(route: FakeRoute): { fetch: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const fetch: FetchLike = async (input, init) => {
    const request: RecordedRequest = {
      url: input,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    };
    requests.push(request);
    return route(request);
  };

  return { fetch, requests };
}

/**
 * A body that counts how many chunks were pulled from it
 */
export function countingBody(chunks: Uint8Array[]): { stream: ReadableStream<Uint8Array>; reads: () => number } {
  let index = 0;
  let pulled = 0;
  const stream = new ReadableStream<Uint8Array>(
    {
      pull(controller) {
        pulled++;
        const chunk = chunks[index++];
        if (chunk) {
          controller.enqueue(chunk);
        } else {
          controller.close();
        }
      },
    },
    { highWaterMark: 0 },
  );
  return { stream, reads: () => pulled };
}
