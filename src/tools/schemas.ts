import { z } from 'zod';

export const ParseDateSchema = z.object({
  date: z.string({ required_error: 'date is required' }),
  date_only_as_utc: z.boolean().optional(),
});

export const NormalizeDateSchema = ParseDateSchema;

export const ListKeywordsSchema = z.object({
  type: z.enum(['MonthName', 'TimeZoneName', 'TimeSeparator', 'AmPm']).optional(),
});

export type ParseDateInput = z.infer<typeof ParseDateSchema>;
export type NormalizeDateInput = z.infer<typeof NormalizeDateSchema>;
export type ListKeywordsInput = z.infer<typeof ListKeywordsSchema>;
