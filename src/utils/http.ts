/**
 * Appels HTTP sortants (webhooks, WhatsApp Cloud API)
 */

export type FetchFn = typeof fetch;

export interface PostJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
}

/**
 * POST d'un corps JSON ; lève une erreur si le statut n'est pas 2xx
 */
export async function postJson(
  fetchImpl: FetchFn,
  url: string,
  body: unknown,
  options: PostJsonOptions
): Promise<Response> {
  const response = await fetchImpl(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      ...options.headers
    },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(options.timeoutMs)
  });

  if (!response.ok) {
    throw new Error(`${response.status} ${response.statusText}`.trim());
  }

  return response;
}
