/**
 * Utilitaires de manipulation de dates
 *
 * Toutes les dates sont manipulées en UTC.
 */

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// Date ISO 8601 : YYYY-MM-DD, suivie éventuellement de l'heure et d'un fuseau (Z ou ±HH:MM)
const ISO_DATE = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:\d{2})?)?$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formate une date au format YYYY-MM-DD
 *
 * @param date - Date à formater
 * @returns Date formatée au format YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * Libellé de jour, ex: "Mon 15 Jan"
 */
export function formatDayLabel(date: Date): string {
  return `${WEEKDAYS[date.getUTCDay()]} ${pad(date.getUTCDate())} ${MONTHS[date.getUTCMonth()]}`;
}

/**
 * Heure au format HH:MM
 */
export function formatTime(date: Date): string {
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}

/**
 * Parse une date ISO 8601 reçue en paramètre de requête
 *
 * Une date ou une date-heure sans fuseau est lue comme UTC, comme les flux iCal.
 *
 * @returns null si la valeur n'a pas une forme ISO 8601 ou n'est pas une date valide
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, day, time, zone] = match;
  const date = new Date(time ? `${day}T${time}${zone ?? 'Z'}` : `${day}T00:00:00Z`);
  return isNaN(date.getTime()) ? null : date;
}
