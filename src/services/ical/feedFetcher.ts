/**
 * Téléchargement des flux iCal
 */

import { FetchError, causeOf, errorMessage } from '../../utils/errors.js';
import type { FetchFn } from '../../utils/http.js';

/**
 * Récupère le texte brut d'un flux
 */
export interface FeedFetcher {
  fetch(url: string, timeoutMs: number): Promise<string>;
}

function isTimeout(error: unknown): boolean {
  // AbortSignal.timeout rejette avec une DOMException nommée TimeoutError
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return false;
  }
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

function toFetchError(url: string, error: unknown, timeoutMs: number): FetchError {
  const detail = isTimeout(error) ? `timeout after ${timeoutMs}ms` : errorMessage(error);
  return new FetchError(url, detail, { cause: causeOf(error) });
}

/**
 * Implémentation HTTP basée sur fetch
 *
 * Toute erreur réseau, tout timeout et tout statut non 2xx lève une FetchError.
 */
export class HttpFeedFetcher implements FeedFetcher {
  constructor(private readonly fetchImpl: FetchFn = (input, init) => fetch(input, init)) {}

  async fetch(url: string, timeoutMs: number): Promise<string> {
    let response: Response;

    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: 'text/calendar, text/plain, */*' },
        signal: AbortSignal.timeout(timeoutMs)
      });
    } catch (error) {
      throw toFetchError(url, error, timeoutMs);
    }

    if (!response.ok) {
      throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`.trim(), { status: response.status });
    }

    // Le délai court aussi pendant la lecture du corps
    try {
      return await response.text();
    } catch (error) {
      throw toFetchError(url, error, timeoutMs);
    }
  }
}
