import { z } from 'zod';

const separator = z
  .string()
  .length(1, 'Separator must be a single character')
  .regex(/^[^\d()-]$/, 'Separator must not be a digit, sign or parenthesis');

export const DateOrderSchema = z.enum(['DMY', 'MDY']);
export type DateOrder = z.infer<typeof DateOrderSchema>;

export const LocaleSchema = z
  .object({
    decimalSeparator: separator,
    thousandsSeparator: separator,
    dateOrder: DateOrderSchema,
  })
  .refine((locale) => locale.decimalSeparator !== locale.thousandsSeparator, {
    message: 'Decimal and thousands separators must differ',
  });
export type Locale = z.infer<typeof LocaleSchema>;

export const ReferencePeriodSchema = z.object({
  referenceYear: z.number().int().min(1900).max(9999),
  referenceMonth: z.number().int().min(1).max(12),
});
export type ReferencePeriod = z.infer<typeof ReferencePeriodSchema>;

export const RunConfigSchema = ReferencePeriodSchema.extend({
  locale: LocaleSchema,
});
export type RunConfig = z.infer<typeof RunConfigSchema>;

export const KeywordFileSchema = z.object({
  keywords: z.array(z.string()),
});
export type KeywordFile = z.infer<typeof KeywordFileSchema>;
