/**
 * Types partagés pour l'API backend
 *
 * Ce fichier contient les interfaces utilisées par les routes et services
 * du backend, correspondant aux structures de données exposées au frontend.
 *
 * Convention : Toutes les interfaces sont préfixées avec "I" (ex: IListing)
 * Les propriétés utilisent des noms camelCase en anglais. Le JSON public
 * est en snake_case (voir api.classes.ts).
 */

/**
 * Enum pour les types de source de calendrier
 */
export enum SourceType {
  Ical = 'ical'
}

/**
 * Titre attribué par le parser quand SUMMARY est absent
 */
export const DEFAULT_EVENT_TITLE = '(No title)';

/**
 * Interface pour un hébergement (listing)
 */
export interface IListing {
  id: string;
  name: string;
  color: string | null; // Couleur UI des chips de l'hébergement
  createdAt: string;    // ISO 8601
}

/**
 * Interface pour une source de calendrier (flux iCal d'une OTA)
 */
export interface ICalendarSource {
  id: string;
  listingId: string;
  name: string;          // Ex: 'Airbnb', 'Booking.com'
  url: string;           // URL du flux iCal
  sourceType: SourceType;
  color: string | null;  // Prioritaire sur la couleur de l'hébergement
  createdAt: string;
}

/**
 * Événement tel que produit par le parser iCal, avant rattachement
 */
export interface IParsedEvent {
  uid: string | null;
  title: string;
  start: Date; // UTC
  end: Date;   // UTC
  allDay: boolean;
  location: string | null;
  description: string | null;
  status: string | null;
}

/**
 * Événement à insérer (sans identifiant interne)
 */
export interface INewEvent {
  listingId: string;
  sourceId: string;
  uid: string | null;
  title: string;
  start: Date;
  end: Date;
  allDay: boolean;
  location: string | null;
  description: string | null;
  status: string | null;
  rawUrl: string;     // URL du flux d'origine, pour traçabilité
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Événement stocké
 */
export interface IEvent extends INewEvent {
  id: string;
}

/**
 * Événement stocké avec le nom et la couleur résolue de sa source
 * (null si la source a disparu)
 */
export interface IEventWithSource extends IEvent {
  sourceName: string | null;
  sourceColor: string | null; // Couleur de la source, sinon celle de l'hébergement
}

/**
 * Résultat d'une synchronisation
 */
export interface ISyncSummary {
  sourcesSynced: number;
  eventsSaved: number;
}

/**
 * Événement exposé au frontend, avec sa source résolue
 */
export interface IEventDisplay {
  id: string;
  listingId: string;
  title: string;
  start: string; // ISO 8601
  end: string;
  allDay: boolean;
  location: string | null;
  description: string | null;
  status: string | null;
  source: IEventSourceRef;
}

export interface IEventSourceRef {
  id: string;
  name: string | null;
  color: string | null;
}

/**
 * Ligne envoyée au webhook d'export tableur
 */
export interface ISheetRow {
  source: string | null;
  title: string;
  start: string;
  end: string;
  allDay: boolean;
  location: string | null;
  description: string | null;
  status: string | null;
}

export interface ICreateListingRequest {
  name: string;
  color?: string;
}

export interface ICreateSourceRequest {
  listingId: string;
  name: string;
  url: string;
  sourceType: SourceType;
  color?: string;
}

export interface IExportRequest {
  webhookUrl: string;
  rangeDays: number;
  listingId?: string;
}

export interface IWhatsAppRequest {
  recipientPhone: string;
  message?: string;
  token?: string;
  phoneNumberId?: string;
  listingId?: string;
}

export interface IExportResult {
  sent: number;
  webhookStatus: number;
}

export interface IWhatsAppResult {
  status: 'sent';
  messageLength: number;
}
