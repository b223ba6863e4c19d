/**
 * Receipt ledger schemas for entry creation, listing, summaries and maintenance
 * Used for request/response validation and type generation
 */

import { z } from "zod";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const YEAR_MONTH = /^\d{4}-(0[1-9]|1[0-2])$/;

export const MAX_RECEIPTS_PER_REQUEST = 1000;

/**
 * One raw receipt as sent by clients
 * Every rule, including the item being an object at all, is enforced per item
 * by the ledger so one bad entry never fails the whole batch
 */
export const ReceiptInputSchema = z.unknown();

/**
 * Request schema for inserting receipts: a JSON array of raw receipts
 */
export const CreateReceiptsRequestSchema = z
  .array(ReceiptInputSchema)
  .min(1, "At least one receipt is required")
  .max(
    MAX_RECEIPTS_PER_REQUEST,
    `At most ${MAX_RECEIPTS_PER_REQUEST} receipts can be sent at once`
  );

/**
 * Stored receipt as returned by the API
 */
export const ReceiptResponseSchema = z.object({
  id: z.number().int().positive(),
  date: z.string().regex(ISO_DATE),
  category: z.string().min(1),
  description: z.string(),
  amount: z.number().int(),
});

/**
 * One rejected item of a bulk insert
 */
export const RejectionSchema = z.object({
  index: z.number().int().nonnegative(),
  field: z.string().nullable(),
  value: z.unknown(),
  code: z.enum(["invalid_receipt", "invalid_date", "empty_category", "invalid_amount", "capacity_exceeded"]),
  message: z.string(),
});

export const CreateReceiptsResponseSchema = z.object({
  created: z.number().int().nonnegative(),
  entries: z.array(ReceiptResponseSchema),
  rejected: z.array(RejectionSchema),
});

/**
 * Query schema for listing and exporting receipts
 * - date_from/date_to: inclusive YYYY-MM-DD bounds
 * - category: exact category name
 */
export const ReceiptFilterQuerySchema = z.object({
  date_from: z.string().regex(ISO_DATE, "date_from must be in YYYY-MM-DD format").optional(),
  date_to: z.string().regex(ISO_DATE, "date_to must be in YYYY-MM-DD format").optional(),
  category: z.string().optional(),
});

export const ListReceiptsResponseSchema = z.object({
  total: z.number().int().nonnegative(),
  totalAmount: z.number().int(),
  categories: z.record(z.string(), z.number().int()),
  entries: z.array(ReceiptResponseSchema),
});

export const ReceiptIdParamSchema = z.object({
  id: z.coerce.number().int("Receipt id must be an integer").positive("Receipt id must be positive"),
});

export const SummaryQuerySchema = z.object({
  year_month: z.string().regex(YEAR_MONTH, "year_month must be in YYYY-MM format").optional(),
});

export const YearMonthParamSchema = z.object({
  yearMonth: z.string().regex(YEAR_MONTH, "year_month must be in YYYY-MM format"),
});

export const MonthTotalsSchema = z.object({
  categories: z.record(z.string(), z.number().int()),
  total: z.number().int(),
  count: z.number().int().nonnegative(),
});

export const MonthlySummaryResponseSchema = z.object({
  months: z.record(z.string(), MonthTotalsSchema),
});

export const MonthlyBreakdownResponseSchema = z.object({
  yearMonth: z.string().regex(YEAR_MONTH),
  totalEntries: z.number().int().nonnegative(),
  totalAmount: z.number().int(),
  categories: z.array(
    z.object({
      category: z.string(),
      amount: z.number().int(),
      percentage: z.number(),
    })
  ),
});

/**
 * Query schema for the destructive clear operation
 * Anything other than an explicit true leaves confirm false
 */
export const ClearQuerySchema = z.object({
  confirm: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => value === "true" || value === "1"),
});

export const ClearResponseSchema = z.object({
  cleared: z.number().int().nonnegative(),
});

export const SeedResponseSchema = z.object({
  added: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
});

// Export TypeScript types derived from schemas
export type ReceiptInput = z.infer<typeof ReceiptInputSchema>;
export type CreateReceiptsRequest = z.infer<typeof CreateReceiptsRequestSchema>;
export type ReceiptResponse = z.infer<typeof ReceiptResponseSchema>;
export type RejectionResponse = z.infer<typeof RejectionSchema>;
export type CreateReceiptsResponse = z.infer<typeof CreateReceiptsResponseSchema>;
export type ReceiptFilterQuery = z.infer<typeof ReceiptFilterQuerySchema>;
export type ListReceiptsResponse = z.infer<typeof ListReceiptsResponseSchema>;
export type SummaryQuery = z.infer<typeof SummaryQuerySchema>;
export type MonthlySummaryResponse = z.infer<typeof MonthlySummaryResponseSchema>;
export type MonthlyBreakdownResponse = z.infer<typeof MonthlyBreakdownResponseSchema>;
export type ClearQuery = z.infer<typeof ClearQuerySchema>;
export type ClearResponse = z.infer<typeof ClearResponseSchema>;
export type SeedResponse = z.infer<typeof SeedResponseSchema>;
