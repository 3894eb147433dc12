/**
 * Reconciliation Zod Schemas
 *
 * Input validation for production events arriving through the CLI,
 * the admin API and the inbox table.
 */

import { z } from 'zod';
import { MO_STATUSES } from '../domain/reconciliation/types.js';

export const lotCodeSchema = z
  .string()
  .trim()
  .min(1, 'Lot code is required')
  .max(64, 'Lot code is too long');

export const producedQuantitySchema = z.coerce
  .number({ invalid_type_error: 'Quantity must be a number' })
  .finite('Quantity must be a finite number')
  .positive('Quantity must be greater than zero');

/** Blank strings become null */
export const unitOfMeasureSchema = z
  .string()
  .trim()
  .max(32, 'Unit of measure is too long')
  .nullish()
  .transform((value) => (value ? value : null));

export const productionEventInputSchema = z.object({
  lotCode: lotCodeSchema,
  quantity: producedQuantitySchema,
  unitOfMeasure: unitOfMeasureSchema,
  capturedAt: z.coerce.date().optional(),
});

export type ProductionEventInput = z.input<typeof productionEventInputSchema>;
export type ParsedProductionEventInput = z.output<typeof productionEventInputSchema>;

export const moStatusSchema = z.enum(MO_STATUSES);

export const attemptsQuerySchema = z.object({
  lotCode: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().positive().max(500).default(50),
});

export type AttemptsQuery = z.output<typeof attemptsQuerySchema>;
