/**
 * Service de parsing iCal
 *
 * Ce service parse les flux iCal des OTA (Airbnb, Booking.com, VRBO...)
 * et extrait les événements normalisés en UTC.
 *
 * Un événement mal formé est ignoré sans interrompre le reste du flux.
 */

import type { IParsedEvent } from '../../types/api.js';
import { DEFAULT_EVENT_TITLE } from '../../types/api.js';

const UTC_DATE_TIME = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;
const FLOATING_DATE_TIME = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/;
const DATE_ONLY = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Reconstruit les lignes logiques d'un document iCal
 *
 * Une ligne commençant par un espace ou une tabulation continue la ligne
 * précédente : on retire ce seul caractère et on concatène le reste.
 *
 * @param icalContent - Contenu brut du flux
 * @returns Lignes logiques, trimées
 */
export function unfoldLines(icalContent: string): string[] {
  const lines: string[] = [];

  for (const line of icalContent.split(/\r\n|\n|\r/)) {
    if (line.startsWith(' ') || line.startsWith('\t')) {
      if (lines.length > 0) {
        lines[lines.length - 1] += line.substring(1);
      }
      continue;
    }
    lines.push(line);
  }

  return lines.map(line => line.trim());
}

function buildUtcDate(parts: string[]): Date | null {
  const [year, month, day, hours = 0, minutes = 0, seconds = 0] = parts.map(part => parseInt(part, 10));
  // setUTCFullYear garde les années 0 à 99 telles quelles, contrairement à Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, 0);

  // Les valeurs impossibles (30 février, 24h...) débordent sur le jour suivant
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    return null;
  }

  return date;
}

/**
 * Convertit une valeur DTSTART/DTEND en instant UTC
 *
 * - `YYYYMMDDTHHMMSSZ` : UTC
 * - `YYYYMMDDTHHMMSS` : heure locale sans fuseau, prise telle quelle comme UTC
 *   (le paramètre TZID n'est pas interprété)
 * - `YYYYMMDD` : journée entière, minuit UTC
 *
 * @returns null si la valeur n'a aucune de ces formes
 */
export function parseIcalDateTime(value: string): Date | null {
  let match: RegExpExecArray | null;

  if (value.endsWith('Z')) {
    match = UTC_DATE_TIME.exec(value);
  } else if (value.includes('T')) {
    match = FLOATING_DATE_TIME.exec(value);
  } else {
    match = DATE_ONLY.exec(value);
  }

  return match ? buildUtcDate(match.slice(1)) : null;
}

/**
 * Une valeur de date seule (8 caractères sans heure) marque une journée entière
 */
export function isDateOnlyValue(value: string): boolean {
  return value.length === 8 && !value.includes('T');
}

/**
 * Transforme les propriétés d'un bloc VEVENT en événement
 *
 * @returns null si DTSTART/DTEND manquent ou sont invalides
 */
function toParsedEvent(properties: Map<string, string>): IParsedEvent | null {
  const startValue = properties.get('DTSTART');
  const endValue = properties.get('DTEND');

  if (!startValue || !endValue) {
    return null;
  }

  const start = parseIcalDateTime(startValue);
  const end = parseIcalDateTime(endValue);

  if (!start || !end) {
    return null;
  }

  return {
    uid: properties.get('UID') ?? null,
    title: properties.get('SUMMARY') || DEFAULT_EVENT_TITLE,
    start,
    end,
    allDay: isDateOnlyValue(startValue),
    location: properties.get('LOCATION') ?? null,
    description: properties.get('DESCRIPTION') ?? null,
    status: properties.get('STATUS') ?? null
  };
}

/**
 * Parse un flux iCal et extrait les événements
 *
 * Les événements sont renvoyés dans l'ordre des blocs VEVENT du document.
 *
 * @param icalContent - Contenu du flux iCal
 * @returns Tableau d'événements parsés
 */
export function parseFeed(icalContent: string): IParsedEvent[] {
  const events: IParsedEvent[] = [];
  let currentEvent: Map<string, string> | null = null;

  for (const line of unfoldLines(icalContent)) {
    if (line === 'BEGIN:VEVENT') {
      currentEvent = new Map();
      continue;
    }

    if (line === 'END:VEVENT') {
      if (currentEvent) {
        const event = toParsedEvent(currentEvent);
        if (event) {
          events.push(event);
        }
      }
      currentEvent = null;
      continue;
    }

    if (!currentEvent) {
      continue;
    }

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) {
      continue;
    }

    // Les paramètres (;TZID=..., ;VALUE=DATE) sont ignorés
    const key = line.substring(0, colonIndex).split(';')[0];
    currentEvent.set(key, line.substring(colonIndex + 1));
  }

  return events;
}
