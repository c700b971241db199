import { z } from 'zod';

// Totals need a numeric amount; every other field, date included, passes through untouched
export const consumptionRecordSchema = z.object({
  amount: z.number()
}).passthrough();

export const datasetSchema = z.record(z.string(), z.array(consumptionRecordSchema));
