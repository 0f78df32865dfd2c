/**
 * Helpers de transformation avec class-transformer
 *
 * Ce fichier contient les fonctions utilitaires pour transformer le JSON
 * snake_case de l'API vers les interfaces TypeScript en camelCase, et inversement.
 *
 * IMPORTANT : Toutes les fonctions de lecture retournent des interfaces (préfixe "I"),
 * jamais des classes. Le code doit toujours coder contre les interfaces.
 */

import { instanceToPlain, plainToInstance } from 'class-transformer';
import type { z } from 'zod';
import type {
  ICalendarSource,
  ICreateListingRequest,
  ICreateSourceRequest,
  IEventDisplay,
  IEventWithSource,
  IExportRequest,
  IExportResult,
  IListing,
  ISheetRow,
  ISyncSummary,
  IWhatsAppRequest,
  IWhatsAppResult
} from '../types/api.js';
import {
  CalendarSourceClass,
  CreateListingRequestClass,
  CreateSourceRequestClass,
  EventDisplayClass,
  EventSourceRefClass,
  ExportRequestClass,
  ExportResultClass,
  ListingClass,
  SheetRowClass,
  SyncSummaryClass,
  WhatsAppRequestClass,
  WhatsAppResultClass
} from '../types/api.classes.js';
import {
  createListingSchema,
  createSourceSchema,
  exportRequestSchema,
  whatsAppRequestSchema
} from '../types/schemas.js';
import { ValidationError } from './errors.js';

/**
 * Options par défaut pour plainToInstance / instanceToPlain
 */
const DEFAULT_TRANSFORM_OPTIONS = {
  excludeExtraneousValues: true
};

export type JsonObject = Record<string, unknown>;

function validate<T extends z.ZodTypeAny>(schema: T, value: unknown, message: string, root: string): z.output<T> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    throw new ValidationError(
      message,
      result.error.issues.map(issue => `${issue.path.join('.') || root}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Valide un corps de requête avec un schéma Zod
 *
 * @throws {ValidationError} avec la liste des champs invalides
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T, json: unknown): z.output<T> {
  return validate(schema, json, 'Invalid request body', 'body');
}

/**
 * Valide les paramètres de requête (querystring)
 *
 * @throws {ValidationError} si un paramètre est répété ou mal typé
 */
export function validateQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.output<T> {
  return validate(schema, query, 'Invalid query string', 'query');
}

/**
 * Transforme un objet JSON en ICreateListingRequest
 */
export function transformCreateListingRequest(json: unknown): ICreateListingRequest {
  return plainToInstance(CreateListingRequestClass, validateBody(createListingSchema, json), DEFAULT_TRANSFORM_OPTIONS);
}

/**
 * Transforme un objet JSON en ICreateSourceRequest
 */
export function transformCreateSourceRequest(json: unknown): ICreateSourceRequest {
  return plainToInstance(CreateSourceRequestClass, validateBody(createSourceSchema, json), DEFAULT_TRANSFORM_OPTIONS);
}

/**
 * Transforme un objet JSON en IExportRequest
 */
export function transformExportRequest(json: unknown): IExportRequest {
  return plainToInstance(ExportRequestClass, validateBody(exportRequestSchema, json), DEFAULT_TRANSFORM_OPTIONS);
}

/**
 * Transforme un objet JSON en IWhatsAppRequest
 */
export function transformWhatsAppRequest(json: unknown): IWhatsAppRequest {
  return plainToInstance(WhatsAppRequestClass, validateBody(whatsAppRequestSchema, json), DEFAULT_TRANSFORM_OPTIONS);
}

function serialize<T extends object>(cls: new () => T, value: T): JsonObject {
  return instanceToPlain(Object.assign(new cls(), value), DEFAULT_TRANSFORM_OPTIONS);
}

export function serializeListing(listing: IListing): JsonObject {
  return serialize(ListingClass, listing);
}

export function serializeSource(source: ICalendarSource): JsonObject {
  return serialize(CalendarSourceClass, source);
}

/**
 * Vue d'affichage d'un événement stocké
 */
export function toEventDisplay(event: IEventWithSource): IEventDisplay {
  return {
    id: event.id,
    listingId: event.listingId,
    title: event.title,
    start: event.start.toISOString(),
    end: event.end.toISOString(),
    allDay: event.allDay,
    location: event.location,
    description: event.description,
    status: event.status,
    source: {
      id: event.sourceId,
      name: event.sourceName,
      color: event.sourceColor
    }
  };
}

export function serializeEvent(event: IEventWithSource): JsonObject {
  const display = toEventDisplay(event);
  return serialize(EventDisplayClass, {
    ...display,
    source: Object.assign(new EventSourceRefClass(), display.source)
  });
}

export function toSheetRow(event: IEventWithSource): ISheetRow {
  return {
    source: event.sourceName,
    title: event.title,
    start: event.start.toISOString(),
    end: event.end.toISOString(),
    allDay: event.allDay,
    location: event.location,
    description: event.description,
    status: event.status
  };
}

export function serializeSheetRow(row: ISheetRow): JsonObject {
  return serialize(SheetRowClass, row);
}

export function serializeSyncSummary(summary: ISyncSummary): JsonObject {
  return serialize(SyncSummaryClass, summary);
}

export function serializeExportResult(result: IExportResult): JsonObject {
  return serialize(ExportResultClass, result);
}

export function serializeWhatsAppResult(result: IWhatsAppResult): JsonObject {
  return serialize(WhatsAppResultClass, result);
}
