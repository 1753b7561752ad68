import { z } from "zod";

export const PeriodSchema = z.enum(["daily", "monthly", "yearly"]);
export const ExtractionFieldSchema = z.enum(["store", "date", "items", "total"]);

export const IdSchema = z.number().int().positive();
export const AmountSchema = z.number().int();
export const CalendarDateSchema = z.iso.date();

export const NAME_MAX_LENGTH = 240;
export const RECEIPT_ITEMS_MAX = 500;

export const TaxonomyCategorySchema = z.object({
  name: z.string().trim().min(1).max(60),
  subcategories: z.array(z.string().trim().min(1).max(60)).min(1),
});

export const TaxonomyDefinitionSchema = z
  .object({
    categories: z.array(TaxonomyCategorySchema).min(1),
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.categories.forEach((category, index) => {
      if (seen.has(category.name)) {
        ctx.addIssue({
          code: "custom",
          path: ["categories", index, "name"],
          message: `duplicate category: ${category.name}`,
        });
      }
      seen.add(category.name);

      if (new Set(category.subcategories).size !== category.subcategories.length) {
        ctx.addIssue({
          code: "custom",
          path: ["categories", index, "subcategories"],
          message: `duplicate subcategory under ${category.name}`,
        });
      }
    });
  });

export const ParsedItemSchema = z.object({
  name: z.string().min(1).max(NAME_MAX_LENGTH),
  category: z.string().min(1).max(60),
  subcategory: z.string().min(1).max(60),
  amount: AmountSchema,
});

export const ParsedReceiptSchema = z.object({
  storeName: z.string().min(1).max(NAME_MAX_LENGTH),
  date: CalendarDateSchema,
  items: z.array(ParsedItemSchema).min(1).max(RECEIPT_ITEMS_MAX),
  totalAmount: AmountSchema,
});

export const ReceiptItemInputSchema = z.object({
  name: z.string().trim().min(1).max(NAME_MAX_LENGTH),
  category: z.string().trim().min(1).max(60),
  subcategory: z.string().trim().min(1).max(60),
  amount: AmountSchema,
});

export const SaveReceiptRequestSchema = z.object({
  storeName: z.string().trim().min(1).max(NAME_MAX_LENGTH),
  date: CalendarDateSchema,
  items: z.array(ReceiptItemInputSchema).max(RECEIPT_ITEMS_MAX),
  totalAmount: AmountSchema,
});

export const ParseReceiptRequestSchema = z.object({
  responseText: z.string().min(1).max(20000),
  ocrText: z.string().max(20000).optional(),
});

export const ParseReceiptResponseSchema = z.object({
  receipt: ParsedReceiptSchema,
});

export const IncompleteExtractionResponseSchema = z.object({
  error: z.literal("incomplete_extraction"),
  missing: z.array(ExtractionFieldSchema).min(1),
});

export const IngestReceiptResponseSchema = z.object({
  receiptId: IdSchema,
  receipt: ParsedReceiptSchema,
});

export const CreateReceiptResponseSchema = z.object({
  receiptId: IdSchema,
});

export const UpdateReceiptResponseSchema = z.object({
  receiptId: IdSchema,
  applied: z.boolean(),
  itemCount: z.number().int().min(0),
});

export const StoredItemSchema = z.object({
  itemId: IdSchema,
  name: z.string().min(1).max(240),
  category: z.string().min(1),
  subcategory: z.string().min(1),
  amount: AmountSchema,
});

export const ReceiptRecordSchema = z.object({
  receiptId: IdSchema,
  storeName: z.string().min(1).max(240),
  date: CalendarDateSchema,
  totalAmount: AmountSchema,
  createdAt: z.iso.datetime(),
  items: z.array(StoredItemSchema),
});

export const ReceiptDetailsResponseSchema = z.object({
  receipt: ReceiptRecordSchema,
});

export const ReceiptListResponseSchema = z.object({
  receipts: z.array(ReceiptRecordSchema),
});

export const StatisticsQuerySchema = z.object({
  period: PeriodSchema.default("monthly"),
});

export const SubcategoryStatisticsSchema = z.object({
  subcategory: z.string().min(1),
  count: z.number().int().positive(),
  totalAmount: AmountSchema,
});

export const CategoryStatisticsSchema = z.object({
  category: z.string().min(1),
  totalAmount: AmountSchema,
  subcategories: z.array(SubcategoryStatisticsSchema).min(1),
});

export const PeriodStatisticsSchema = z.object({
  period: z.string().min(4).max(10),
  totalAmount: AmountSchema,
  categories: z.array(CategoryStatisticsSchema).min(1),
});

export const StatisticsResponseSchema = z.object({
  granularity: PeriodSchema,
  periods: z.array(PeriodStatisticsSchema),
});

export const TrendsQuerySchema = z.object({
  period: PeriodSchema.default("monthly"),
  category: z.string().trim().min(1).max(60).optional(),
});

export const TrendPointSchema = z.object({
  period: z.string().min(4).max(10),
  totalAmount: AmountSchema,
});

export const TrendsResponseSchema = z.object({
  granularity: PeriodSchema,
  category: z.string().min(1).optional(),
  points: z.array(TrendPointSchema),
  total: AmountSchema,
});

export const CategoryInsightSchema = z.object({
  category: z.string().min(1),
  count: z.number().int().positive(),
  totalAmount: AmountSchema,
  averageAmount: z.number(),
  minAmount: AmountSchema,
  maxAmount: AmountSchema,
});

export const InsightsResponseSchema = z.object({
  insights: z.array(CategoryInsightSchema),
});

export const HealthResponseSchema = z.object({
  ok: z.literal(true),
  service: z.string().min(1),
  now: z.iso.datetime(),
});

export type Period = z.infer<typeof PeriodSchema>;
export type ExtractionField = z.infer<typeof ExtractionFieldSchema>;
export type TaxonomyCategory = z.infer<typeof TaxonomyCategorySchema>;
export type TaxonomyDefinition = z.infer<typeof TaxonomyDefinitionSchema>;
export type ParsedItem = z.infer<typeof ParsedItemSchema>;
export type ParsedReceipt = z.infer<typeof ParsedReceiptSchema>;
export type ReceiptItemInput = z.infer<typeof ReceiptItemInputSchema>;
export type SaveReceiptRequest = z.infer<typeof SaveReceiptRequestSchema>;
export type ParseReceiptRequest = z.infer<typeof ParseReceiptRequestSchema>;
export type ParseReceiptResponse = z.infer<typeof ParseReceiptResponseSchema>;
export type IncompleteExtractionResponse = z.infer<typeof IncompleteExtractionResponseSchema>;
export type IngestReceiptResponse = z.infer<typeof IngestReceiptResponseSchema>;
export type CreateReceiptResponse = z.infer<typeof CreateReceiptResponseSchema>;
export type UpdateReceiptResponse = z.infer<typeof UpdateReceiptResponseSchema>;
export type StoredItem = z.infer<typeof StoredItemSchema>;
export type ReceiptRecord = z.infer<typeof ReceiptRecordSchema>;
export type ReceiptDetailsResponse = z.infer<typeof ReceiptDetailsResponseSchema>;
export type ReceiptListResponse = z.infer<typeof ReceiptListResponseSchema>;
export type StatisticsQuery = z.infer<typeof StatisticsQuerySchema>;
export type SubcategoryStatistics = z.infer<typeof SubcategoryStatisticsSchema>;
export type CategoryStatistics = z.infer<typeof CategoryStatisticsSchema>;
export type PeriodStatistics = z.infer<typeof PeriodStatisticsSchema>;
export type StatisticsResponse = z.infer<typeof StatisticsResponseSchema>;
export type TrendsQuery = z.infer<typeof TrendsQuerySchema>;
export type TrendPoint = z.infer<typeof TrendPointSchema>;
export type TrendsResponse = z.infer<typeof TrendsResponseSchema>;
export type CategoryInsight = z.infer<typeof CategoryInsightSchema>;
export type InsightsResponse = z.infer<typeof InsightsResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
