/**
 * Market data response validation schemas
 * Using Zod for runtime type validation and TypeScript inference
 */

import { z } from 'zod';

// Plain decimal with an optional exponent; hex, binary and octal literals are not prices
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * A finite number sent either as a JSON number or as a decimal string
 */
export const NumericValueSchema = z
  .union([z.number(), z.string().trim().regex(DECIMAL_PATTERN, 'Expected a decimal number')])
  .transform(value => Number(value))
  .pipe(z.number().finite());

/**
 * Circulating supply endpoint: the body is the bare value
 */
export const CirculatingSupplyResponseSchema = NumericValueSchema;

/**
 * One ranked ticker record; only the last trade price is consumed
 */
export const TickerRecordSchema = z
  .object({
    symbol: z.string().optional(),
    last: NumericValueSchema,
  })
  .passthrough();

/**
 * Market ticker endpoint: the first record of `data` is authoritative,
 * records after it are not inspected
 */
export const TickerResponseSchema = z
  .object({
    code: z.number().optional(),
    data: z.tuple([TickerRecordSchema]).rest(z.unknown()),
  })
  .passthrough();

export type TickerRecord = z.infer<typeof TickerRecordSchema>;
export type TickerResponse = z.infer<typeof TickerResponseSchema>;
