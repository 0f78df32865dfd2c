/**
 * Schémas Zod de validation des requêtes (JSON snake_case)
 */

import { z } from 'zod';
import { SourceType } from './api.js';

// Une chaîne vide vaut absence (repli sur la configuration pour les identifiants)
const optionalText = z.string().trim().nullish().transform(value => value || undefined);

// Paramètre de requête : une valeur répétée (tableau) est refusée
const queryText = z.string().optional().transform(value => value || undefined);

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine(value => /^https?:\/\//i.test(value), { message: 'Must be an http(s) URL' });

export const createListingSchema = z.object({
  name: z.string().trim().min(1),
  color: optionalText
});

export const createSourceSchema = z.object({
  listing_id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  url: httpUrl,
  source_type: z.nativeEnum(SourceType).default(SourceType.Ical),
  color: optionalText
});

export const exportRequestSchema = z.object({
  webhook_url: httpUrl,
  range_days: z.number().int().min(1).max(365).default(30),
  listing_id: optionalText
});

export const whatsAppRequestSchema = z.object({
  recipient_phone: z.string().trim().min(1),
  message: z.string().nullish().transform(value => value || undefined),
  token: optionalText,
  phone_number_id: optionalText,
  listing_id: optionalText
});

export const sourcesQuerySchema = z.object({
  listing_id: queryText
});

export const syncQuerySchema = z.object({
  source_id: queryText,
  listing_id: queryText
});

export const eventsQuerySchema = z.object({
  start: queryText,
  end: queryText,
  listing_id: queryText
});
