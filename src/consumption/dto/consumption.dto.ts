// Fixed categories a fresh dataset starts with
export const CATEGORIES = ['energy', 'water', 'waste'] as const;

export type Category = typeof CATEGORIES[number];

// One logged measurement; the unit follows the category (kWh, liters, kg)
export interface ConsumptionRecord {
  date: string;
  amount: number;
}

// A record as found in a loaded file; only the amount is relied upon
export interface StoredRecord {
  amount: number;
  date?: unknown;
}

// All records, keyed by category, in logging order.
// Loaded files may carry keys outside CATEGORIES; they are kept as-is.
export interface Dataset {
  [category: string]: StoredRecord[];
}

export interface CategoryTotal {
  category: string;
  total: number;
}

export type LoadOutcome = 'loaded' | 'missing' | 'malformed';

export type RecordResult =
  | { ok: true; category: string; record: ConsumptionRecord }
  | { ok: false; reason: 'unknown-category' };

export type SaveResult =
  | { ok: true; path: string }
  | { ok: false; reason: string };

export type ParseAmountResult =
  | { ok: true; value: number }
  | { ok: false; reason: 'not-a-number' | 'not-finite' };

export type Recommendation =
  | { kind: 'within-limits'; category: string; total: number }
  | { kind: 'advisory'; category: string; total: number; advice: string };

export function createEmptyDataset(): Dataset {
  const dataset: Dataset = {};
  for (const category of CATEGORIES) {
    dataset[category] = [];
  }
  return dataset;
}
