/**
 * Logger console préfixé par le traceId de la requête en cours
 * et le temps écoulé depuis son début
 */

import { getElapsedMs, getTraceId } from '../services/correlationContext.js';

export interface Logger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

function prefix(): string {
  const traceId = getTraceId();
  if (!traceId) {
    return '[no-trace]';
  }
  return `[${traceId} +${getElapsedMs() ?? 0}ms]`;
}

function formatData(data: unknown): string {
  return data !== undefined ? JSON.stringify(data) : '';
}

export function createLogger(): Logger {
  return {
    info: (message, data) => {
      console.log(prefix(), message, formatData(data));
    },
    warn: (message, data) => {
      console.warn(prefix(), message, formatData(data));
    },
    error: (message, error) => {
      console.error(prefix(), message, error instanceof Error ? error.message : formatData(error));
      if (error instanceof Error && error.stack) {
        console.error(error.stack);
      }
    }
  };
}

/**
 * Logger muet, pour les tests
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {}
};
