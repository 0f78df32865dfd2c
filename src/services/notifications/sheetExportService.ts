/**
 * Export des événements à venir vers un webhook tableur
 * (Apps Script Web App ou tout endpoint acceptant du JSON)
 */

import type { IExportRequest, IExportResult } from '../../types/api.js';
import type { CalendarStore } from '../storage/eventStore.js';
import { addDays } from '../../utils/dateUtils.js';
import { WebhookError, causeOf, errorMessage } from '../../utils/errors.js';
import { postJson, type FetchFn } from '../../utils/http.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { serializeSheetRow, toSheetRow } from '../../utils/transformers.js';

export interface SheetExportDependencies {
  store: CalendarStore;
  fetchImpl: FetchFn;
  timeoutMs: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Envoie au webhook les événements qui chevauchent [maintenant, maintenant + rangeDays)
 *
 * Corps envoyé : { events: [{ source, title, start, end, all_day, ... }] }
 *
 * @throws {WebhookError} si le webhook échoue ou répond hors 2xx
 */
export async function exportToSheet(
  request: IExportRequest,
  deps: SheetExportDependencies
): Promise<IExportResult> {
  const logger = deps.logger ?? createLogger();
  const now = (deps.now ?? (() => new Date()))();

  const events = await deps.store.findEventsOverlapping({
    from: now,
    to: addDays(now, request.rangeDays),
    listingId: request.listingId
  });
  const rows = events.map(event => serializeSheetRow(toSheetRow(event)));

  let response: Response;
  try {
    response = await postJson(deps.fetchImpl, request.webhookUrl, { events: rows }, { timeoutMs: deps.timeoutMs });
  } catch (error) {
    logger.error(`[SheetExport] Webhook ${request.webhookUrl} failed:`, error);
    throw new WebhookError(errorMessage(error), causeOf(error));
  }

  logger.info(`[SheetExport] Sent ${rows.length} events`, { status: response.status });

  return {
    sent: rows.length,
    webhookStatus: response.status
  };
}
