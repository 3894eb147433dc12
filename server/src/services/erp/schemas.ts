/**
 * ERP wire schemas
 *
 * Every response body is parsed here before it is mapped to domain types.
 * Quantities arrive as numbers or numeric strings depending on the endpoint.
 */

import { z } from 'zod';

const numericSchema = z
    .union([z.number(), z.string().trim().min(1).transform(Number)])
    .pipe(z.number().finite());

const nullableText = z.string().nullish().transform((value) => value ?? null);

export const erpTargetLotSchema = z.object({
    code: z.string(),
}).passthrough();

export const erpManufacturingOrderSchema = z.object({
    man_ord_id: numericSchema.pipe(z.number().int()),
    code: z.string(),
    item_code: z.string().nullish().transform((value) => value ?? ''),
    item_title: z.string().nullish().transform((value) => value ?? ''),
    status: numericSchema.pipe(z.number().int()),
    quantity: numericSchema,
    actual_quantity: numericSchema.nullish().transform((value) => value ?? null),
    unit: nullableText,
    target_lots: z.array(erpTargetLotSchema).nullish().transform((value) => value ?? []),
}).passthrough();

export type ErpManufacturingOrder = z.output<typeof erpManufacturingOrderSchema>;

export const erpManufacturingOrderListSchema = z.array(erpManufacturingOrderSchema);

/**
 * Body of PUT /manufacturing-orders/{id}. Planned quantity is never sent.
 */
export interface ErpManufacturingOrderUpdate {
    actual_quantity: number;
    status: number;
}
