/**
 * Envoi du planning par WhatsApp (Cloud API)
 */

import type { WhatsAppConfig } from '../../config/env.js';
import type { IEventWithSource, IWhatsAppRequest, IWhatsAppResult } from '../../types/api.js';
import type { CalendarStore } from '../storage/eventStore.js';
import { addDays, formatDate, formatDayLabel, formatTime } from '../../utils/dateUtils.js';
import { WhatsAppError, causeOf, errorMessage } from '../../utils/errors.js';
import { postJson, type FetchFn } from '../../utils/http.js';
import { createLogger, type Logger } from '../../utils/logger.js';

export const SCHEDULE_DAYS = 7;

export interface WhatsAppDependencies {
  store: CalendarStore;
  config: WhatsAppConfig;
  fetchImpl: FetchFn;
  timeoutMs: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Compose le résumé du planning, groupé par jour
 *
 * Les événements doivent être triés par début.
 */
export function buildScheduleMessage(events: IEventWithSource[]): string {
  if (events.length === 0) {
    return 'No upcoming events.';
  }

  const lines = [`Upcoming schedule (next ${SCHEDULE_DAYS} days):`];
  let currentDay: string | null = null;

  for (const event of events) {
    const day = formatDate(event.start);
    if (day !== currentDay) {
      lines.push(`\n${formatDayLabel(event.start)}`);
      currentDay = day;
    }

    const timePart = event.allDay ? 'All-day' : `${formatTime(event.start)}–${formatTime(event.end)}`;
    lines.push(`• ${timePart} · ${event.title} (${event.sourceName ?? ''})`);
  }

  return lines.join('\n');
}

/**
 * Envoie le planning des prochains jours (ou un message libre) à un destinataire
 *
 * Le token et l'identifiant du numéro de la requête sont prioritaires sur la configuration.
 *
 * @throws {WhatsAppError} si les identifiants manquent ou si l'API échoue
 */
export async function sendSchedule(
  request: IWhatsAppRequest,
  deps: WhatsAppDependencies
): Promise<IWhatsAppResult> {
  const logger = deps.logger ?? createLogger();
  const token = request.token ?? deps.config.token;
  const phoneNumberId = request.phoneNumberId ?? deps.config.phoneNumberId;

  if (!token || !phoneNumberId) {
    throw new WhatsAppError('Missing WhatsApp credentials (token/phone_number_id)');
  }

  let body: string;
  if (request.message) {
    body = request.message;
  } else {
    const now = (deps.now ?? (() => new Date()))();
    const events = await deps.store.findEventsOverlapping({
      from: now,
      to: addDays(now, SCHEDULE_DAYS),
      listingId: request.listingId
    });
    body = buildScheduleMessage(events);
  }

  const url = `${deps.config.apiBaseUrl.replace(/\/+$/, '')}/${encodeURIComponent(phoneNumberId)}/messages`;
  try {
    await postJson(deps.fetchImpl, url, {
      messaging_product: 'whatsapp',
      to: request.recipientPhone,
      type: 'text',
      text: { body }
    }, {
      headers: { Authorization: `Bearer ${token}` },
      timeoutMs: deps.timeoutMs
    });
  } catch (error) {
    logger.error('[WhatsApp] Send failed:', error);
    throw new WhatsAppError(`WhatsApp API error: ${errorMessage(error)}`, causeOf(error));
  }

  // Longueur en caractères Unicode, pas en unités UTF-16
  const messageLength = [...body].length;
  logger.info(`[WhatsApp] Schedule sent to ${request.recipientPhone}`, { length: messageLength });

  return {
    status: 'sent',
    messageLength
  };
}
