import type {
  CategoryInsight,
  CategoryStatistics,
  InsightsResponse,
  Period,
  PeriodStatistics,
  StatisticsResponse,
  TrendsResponse,
} from "@receipt-ledger/contracts";
import type { ItemFact, LedgerReader } from "../types/receipt-store.js";

// Receipt dates are stored as YYYY-MM-DD, so a bucket is a fixed-width prefix.
const PERIOD_KEY_LENGTH: Record<Period, number> = {
  daily: 10,
  monthly: 7,
  yearly: 4,
};

type LeafTotals = {
  count: number;
  totalAmount: number;
};

export function toPeriodKey(date: string, period: Period): string {
  return date.slice(0, PERIOD_KEY_LENGTH[period]);
}

export class AggregationEngine {
  private readonly reader: LedgerReader;

  constructor(reader: LedgerReader) {
    this.reader = reader;
  }

  statistics(period: Period): StatisticsResponse {
    const buckets = new Map<string, Map<string, Map<string, LeafTotals>>>();

    for (const fact of this.reader.itemFacts()) {
      const periodKey = toPeriodKey(fact.date, period);
      const categories = getOrCreate(
        buckets,
        periodKey,
        () => new Map<string, Map<string, LeafTotals>>(),
      );
      const subcategories = getOrCreate(
        categories,
        fact.category,
        () => new Map<string, LeafTotals>(),
      );
      const leaf = getOrCreate(subcategories, fact.subcategory, (): LeafTotals => ({
        count: 0,
        totalAmount: 0,
      }));
      leaf.count += 1;
      leaf.totalAmount += fact.amount;
    }

    const periods: PeriodStatistics[] = [...buckets.entries()].map(([periodKey, categories]) => {
      const categoryStats: CategoryStatistics[] = [...categories.entries()].map(
        ([category, subcategories]) => {
          const leaves = [...subcategories.entries()]
            .map(([subcategory, totals]) => ({ subcategory, ...totals }))
            .toSorted(
              (a, b) => b.totalAmount - a.totalAmount || compareText(a.subcategory, b.subcategory),
            );
          return {
            category,
            totalAmount: sum(leaves.map((leaf) => leaf.totalAmount)),
            subcategories: leaves,
          };
        },
      );

      return {
        period: periodKey,
        totalAmount: sum(categoryStats.map((entry) => entry.totalAmount)),
        categories: categoryStats.toSorted(
          (a, b) => b.totalAmount - a.totalAmount || compareText(a.category, b.category),
        ),
      };
    });

    return {
      granularity: period,
      periods: periods.toSorted((a, b) => compareText(b.period, a.period)),
    };
  }

  trends(params: { period: Period; category?: string }): TrendsResponse {
    const category = params.category?.trim() || undefined;
    const totals = new Map<string, number>();

    for (const fact of this.reader.itemFacts()) {
      if (category !== undefined && fact.category !== category) {
        continue;
      }
      const periodKey = toPeriodKey(fact.date, params.period);
      totals.set(periodKey, (totals.get(periodKey) ?? 0) + fact.amount);
    }

    const points = [...totals.entries()]
      .map(([period, totalAmount]) => ({ period, totalAmount }))
      .toSorted((a, b) => compareText(a.period, b.period));

    return {
      granularity: params.period,
      category,
      points,
      total: sum(points.map((point) => point.totalAmount)),
    };
  }

  insights(): InsightsResponse {
    const byCategory = new Map<string, ItemFact[]>();
    for (const fact of this.reader.itemFacts()) {
      getOrCreate(byCategory, fact.category, (): ItemFact[] => []).push(fact);
    }

    const insights: CategoryInsight[] = [...byCategory.entries()].map(([category, facts]) => {
      const amounts = facts.map((fact) => fact.amount);
      const totalAmount = sum(amounts);
      return {
        category,
        count: amounts.length,
        totalAmount,
        averageAmount: round(totalAmount / amounts.length),
        minAmount: amounts.reduce((acc, value) => Math.min(acc, value)),
        maxAmount: amounts.reduce((acc, value) => Math.max(acc, value)),
      };
    });

    return {
      insights: insights.toSorted(
        (a, b) => b.totalAmount - a.totalAmount || compareText(a.category, b.category),
      ),
    };
  }
}

function getOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  const existing = map.get(key);
  if (existing !== undefined) {
    return existing;
  }
  const created = create();
  map.set(key, created);
  return created;
}

function sum(values: number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

function round(value: number): number {
  return Number.parseFloat(value.toFixed(2));
}

function compareText(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
