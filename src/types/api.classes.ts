/**
 * Classes pour les données échangées avec le frontend avec class-transformer
 *
 * Ce fichier contient les classes avec décorateurs pour mapper les noms JSON
 * (snake_case) vers les noms de propriétés TypeScript en camelCase.
 *
 * IMPORTANT : Ces classes implémentent les interfaces préfixées "I" définies dans api.ts
 * Le code doit toujours utiliser les interfaces, jamais les classes directement.
 */

import 'reflect-metadata';
import { Expose, Type } from 'class-transformer';
import type {
  ICalendarSource,
  ICreateListingRequest,
  ICreateSourceRequest,
  IEventDisplay,
  IEventSourceRef,
  IExportRequest,
  IExportResult,
  IListing,
  ISheetRow,
  ISyncSummary,
  IWhatsAppRequest,
  IWhatsAppResult
} from './api.js';
import { SourceType } from './api.js';

/**
 * Structure d'un hébergement
 */
export class ListingClass implements IListing {
  @Expose({ name: 'id' })
  id!: string;

  @Expose({ name: 'name' })
  name!: string;

  @Expose({ name: 'color' })
  color!: string | null;

  @Expose({ name: 'created_at' })
  createdAt!: string;
}

/**
 * Structure d'une source de calendrier
 */
export class CalendarSourceClass implements ICalendarSource {
  @Expose({ name: 'id' })
  id!: string;

  @Expose({ name: 'listing_id' })
  listingId!: string;

  @Expose({ name: 'name' })
  name!: string;

  @Expose({ name: 'url' })
  url!: string;

  @Expose({ name: 'source_type' })
  sourceType!: SourceType;

  @Expose({ name: 'color' })
  color!: string | null;

  @Expose({ name: 'created_at' })
  createdAt!: string;
}

export class EventSourceRefClass implements IEventSourceRef {
  @Expose()
  id!: string;

  @Expose()
  name!: string | null;

  @Expose()
  color!: string | null;
}

/**
 * Structure d'un événement affiché
 */
export class EventDisplayClass implements IEventDisplay {
  @Expose({ name: 'id' })
  id!: string;

  @Expose({ name: 'listing_id' })
  listingId!: string;

  @Expose({ name: 'title' })
  title!: string;

  @Expose({ name: 'start' })
  start!: string;

  @Expose({ name: 'end' })
  end!: string;

  @Expose({ name: 'all_day' })
  allDay!: boolean;

  @Expose({ name: 'location' })
  location!: string | null;

  @Expose({ name: 'description' })
  description!: string | null;

  @Expose({ name: 'status' })
  status!: string | null;

  @Expose({ name: 'source' })
  @Type(() => EventSourceRefClass)
  source!: IEventSourceRef;
}

/**
 * Ligne d'export tableur
 */
export class SheetRowClass implements ISheetRow {
  @Expose({ name: 'source' })
  source!: string | null;

  @Expose({ name: 'title' })
  title!: string;

  @Expose({ name: 'start' })
  start!: string;

  @Expose({ name: 'end' })
  end!: string;

  @Expose({ name: 'all_day' })
  allDay!: boolean;

  @Expose({ name: 'location' })
  location!: string | null;

  @Expose({ name: 'description' })
  description!: string | null;

  @Expose({ name: 'status' })
  status!: string | null;
}

export class SyncSummaryClass implements ISyncSummary {
  @Expose({ name: 'sources_synced' })
  sourcesSynced!: number;

  @Expose({ name: 'events_saved' })
  eventsSaved!: number;
}

export class ExportResultClass implements IExportResult {
  @Expose({ name: 'sent' })
  sent!: number;

  @Expose({ name: 'webhook_status' })
  webhookStatus!: number;
}

export class WhatsAppResultClass implements IWhatsAppResult {
  @Expose({ name: 'status' })
  status!: 'sent';

  @Expose({ name: 'message_length' })
  messageLength!: number;
}

/**
 * Requête de création d'un hébergement
 */
export class CreateListingRequestClass implements ICreateListingRequest {
  @Expose({ name: 'name' })
  name!: string;

  @Expose({ name: 'color' })
  color?: string;
}

/**
 * Requête d'enregistrement d'une source
 */
export class CreateSourceRequestClass implements ICreateSourceRequest {
  @Expose({ name: 'listing_id' })
  listingId!: string;

  @Expose({ name: 'name' })
  name!: string;

  @Expose({ name: 'url' })
  url!: string;

  @Expose({ name: 'source_type' })
  sourceType!: SourceType;

  @Expose({ name: 'color' })
  color?: string;
}

/**
 * Requête d'export vers un webhook tableur (Apps Script ou autre)
 */
export class ExportRequestClass implements IExportRequest {
  @Expose({ name: 'webhook_url' })
  webhookUrl!: string;

  @Expose({ name: 'range_days' })
  rangeDays!: number;

  @Expose({ name: 'listing_id' })
  listingId?: string;
}

/**
 * Requête d'envoi du planning par WhatsApp
 */
export class WhatsAppRequestClass implements IWhatsAppRequest {
  @Expose({ name: 'recipient_phone' })
  recipientPhone!: string;

  @Expose({ name: 'message' })
  message?: string;

  @Expose({ name: 'token' })
  token?: string;

  @Expose({ name: 'phone_number_id' })
  phoneNumberId?: string;

  @Expose({ name: 'listing_id' })
  listingId?: string;
}
