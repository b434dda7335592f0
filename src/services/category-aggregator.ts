/**
 * Category Aggregator
 *
 * Computes windowed ledger sums per investment category (and per tag within a
 * category) for each transaction kind:
 * - status: balance summed over status rows booked on or before the previous
 *   quarter end
 * - change: delta summed over change rows booked from the current quarter
 *   start through the report date
 * and combines them into report line items. Realized figures use the window
 * from year start through the report date.
 *
 * Every sum over an empty selection is 0, and no figure is ever -0.
 */

import { logFlow } from '../utils/logging.js';
import { AggregationAmbiguityError } from '../utils/errors.js';
import { normalizeZero, sumBy } from '../utils/numeric.js';
import { RealizedKind, type TransactionKindId } from '../types/investment-taxonomy.js';
import type { EnrichedFactSnapshot, EnrichedHolding, EnrichedLedgerEntry } from '../types/ledger.js';
import type { ReportPeriod, TagAttributePolicy } from '../types/report.js';

// ============================================================================
// TYPES
// ============================================================================

export interface WindowSums {
  status: number;
  change: number;
}

export type KindSums = Readonly<Record<TransactionKindId, WindowSums>>;

export interface LineItems {
  accountingValue: number;
  objectiveValue: number;
  revaluationEffect: number;
  revaluationReserve: number;
  fxDifference: number;
  amortization: number;
}

export interface AggregationWindows {
  /** status rows booked on or before the previous quarter end */
  status: readonly EnrichedLedgerEntry[];
  /** change rows booked within [quarter start, report date] */
  change: readonly EnrichedLedgerEntry[];
  /** rows in either of the above, in source order */
  combined: readonly EnrichedLedgerEntry[];
  /** all rows booked within [year start, report date] */
  realized: readonly EnrichedLedgerEntry[];
}

export const TAG_ATTRIBUTE_FIELDS = ['ifrsClassification', 'valuationMethod', 'valuationMethodAlt', 'fundingSource'] as const;
export type TagAttributeField = (typeof TAG_ATTRIBUTE_FIELDS)[number];
export type TagAttributes = Pick<EnrichedLedgerEntry, TagAttributeField>;

export interface TagAggregate {
  tag: string;
  attributes: TagAttributes;
  sums: KindSums;
  lineItems: LineItems;
}

export interface RealizedFigures {
  shareCount: number;
  accountingValue: number;
  realizedProfitLoss: number;
  sellValue: number;
}

export interface RealizedTagFigures extends RealizedFigures {
  tag: string;
  attributes: TagAttributes;
}

type EntryFilter = (entry: EnrichedLedgerEntry) => boolean;

/**
 * Sign applied to each status sum. Revaluation reserve balances are booked
 * with the opposite sign to the one the report expects.
 */
const STATUS_SIGN: Readonly<Record<TransactionKindId, 1 | -1>> = {
  ACCOUNTING_VALUE: 1,
  REVALUATION_EFFECT: 1,
  REVALUATION_RESERVE: -1,
  EXCHANGE_RATE_DIFFERENCE: 1,
  AMORTIZATION: 1
};

// ============================================================================
// PURE COMPUTATIONS
// ============================================================================

export function sliceWindows(entries: readonly EnrichedLedgerEntry[], period: ReportPeriod): AggregationWindows {
  const inStatusWindow = (entry: EnrichedLedgerEntry): boolean =>
    entry.isStatus && entry.bookingDate <= period.previousQuarterEnd;
  const inChangeWindow = (entry: EnrichedLedgerEntry): boolean =>
    entry.isChange && entry.bookingDate >= period.quarterStart && entry.bookingDate <= period.reportDate;

  return {
    status: entries.filter(inStatusWindow),
    change: entries.filter(inChangeWindow),
    combined: entries.filter(entry => inStatusWindow(entry) || inChangeWindow(entry)),
    realized: entries.filter(entry => entry.bookingDate >= period.yearStart && entry.bookingDate <= period.reportDate)
  };
}

export function computeKindSums(windows: AggregationWindows, matches: EntryFilter): KindSums {
  const sumsFor = (kind: TransactionKindId): WindowSums => {
    const status = sumBy(
      windows.status.filter(entry => entry.unrealizedKind === kind && matches(entry)),
      entry => entry.balance
    );
    const change = sumBy(
      windows.change.filter(entry => entry.unrealizedKind === kind && matches(entry)),
      entry => entry.delta
    );
    return { status: normalizeZero(status * STATUS_SIGN[kind]), change };
  };

  return {
    ACCOUNTING_VALUE: sumsFor('ACCOUNTING_VALUE'),
    REVALUATION_EFFECT: sumsFor('REVALUATION_EFFECT'),
    REVALUATION_RESERVE: sumsFor('REVALUATION_RESERVE'),
    EXCHANGE_RATE_DIFFERENCE: sumsFor('EXCHANGE_RATE_DIFFERENCE'),
    AMORTIZATION: sumsFor('AMORTIZATION')
  };
}

/**
 * The only place line items are derived from kind sums.
 */
export function combineKindSums(sums: KindSums): LineItems {
  const accounting = sums.ACCOUNTING_VALUE;
  const fx = sums.EXCHANGE_RATE_DIFFERENCE;
  const amortization = sums.AMORTIZATION;
  const reserve = sums.REVALUATION_RESERVE;

  const revaluationEffect = normalizeZero(reserve.change + sums.REVALUATION_EFFECT.change);
  const objectiveValue =
    accounting.status +
    accounting.change +
    revaluationEffect +
    fx.status +
    fx.change +
    amortization.status +
    amortization.change;

  return {
    accountingValue: normalizeZero(accounting.status + accounting.change),
    objectiveValue: normalizeZero(objectiveValue),
    revaluationEffect,
    revaluationReserve: normalizeZero(reserve.status + reserve.change),
    fxDifference: normalizeZero(fx.status + fx.change),
    amortization: normalizeZero(amortization.status + amortization.change)
  };
}

/**
 * Distinct non-empty tags, in ascending order
 */
export function distinctTags(rows: readonly { tag: string | null }[]): string[] {
  const tags = new Set<string>();
  for (const row of rows) {
    if (row.tag !== null && row.tag !== '') {
      tags.add(row.tag);
    }
  }
  return [...tags].sort();
}

/**
 * Resolves the descriptive attributes of a tag from the rows that carry it.
 * The first row in source order supplies every value; under
 * `require-agreement` any disagreement between rows is an error instead of a
 * warning.
 */
export function resolveTagAttributes(
  tag: string,
  rows: readonly EnrichedLedgerEntry[],
  policy: TagAttributePolicy
): TagAttributes {
  const resolve = (field: TagAttributeField): string | null => {
    const first = rows[0];
    if (!first) {
      return null;
    }
    const values = [...new Set(rows.map(row => row[field]))];
    if (values.length > 1) {
      if (policy === 'require-agreement') {
        throw new AggregationAmbiguityError(tag, field, values);
      }
      logFlow('CATEGORY_AGGREGATOR', 'WARN', `Tag '${tag}' has conflicting ${field} values, first row wins`, {
        values,
        chosen: first[field]
      });
    }
    return first[field];
  };

  return {
    ifrsClassification: resolve('ifrsClassification'),
    valuationMethod: resolve('valuationMethod'),
    valuationMethodAlt: resolve('valuationMethodAlt'),
    fundingSource: resolve('fundingSource')
  };
}

export function computeRealizedFigures(
  rows: readonly EnrichedLedgerEntry[],
  holdings: readonly EnrichedHolding[]
): RealizedFigures {
  const accountingValue = sumBy(
    rows.filter(entry => entry.realizedKind === RealizedKind.ACCOUNTING_VALUE),
    entry => entry.balance
  );
  const realizedProfitLoss = normalizeZero(
    -sumBy(
      rows.filter(entry => entry.realizedKind === RealizedKind.REALIZED_PROFIT_LOSS),
      entry => entry.balance
    )
  );

  return {
    shareCount: sumBy(holdings, holding => holding.nominal),
    accountingValue,
    realizedProfitLoss,
    sellValue: normalizeZero(accountingValue + realizedProfitLoss)
  };
}

// ============================================================================
// AGGREGATOR
// ============================================================================

/**
 * Aggregates one immutable, enriched snapshot for one reporting period. The
 * windows are sliced once at construction; every query filters those.
 */
export class CategoryAggregator {
  private readonly windows: AggregationWindows;

  constructor(
    private readonly facts: EnrichedFactSnapshot,
    readonly period: ReportPeriod,
    private readonly policy: TagAttributePolicy = 'first-wins'
  ) {
    this.windows = sliceWindows(facts.ledgerEntries, period);
    logFlow('CATEGORY_AGGREGATOR', 'INFO', 'Aggregation windows sliced', {
      period,
      statusRows: this.windows.status.length,
      changeRows: this.windows.change.length,
      realizedRows: this.windows.realized.length
    });
  }

  sumsForCategory(category: string): KindSums {
    return computeKindSums(this.windows, entry => entry.category === category);
  }

  lineItemsForCategory(category: string): LineItems {
    return combineKindSums(this.sumsForCategory(category));
  }

  /**
   * Per-tag line items for one category. Tags are those found on status or
   * change window rows of the category.
   */
  aggregateTags(category: string): TagAggregate[] {
    const categoryRows = this.windows.combined.filter(entry => entry.category === category);

    return distinctTags(categoryRows).map(tag => {
      const tagRows = categoryRows.filter(entry => entry.tag === tag);
      const sums = computeKindSums(this.windows, entry => entry.category === category && entry.tag === tag);
      return {
        tag,
        attributes: resolveTagAttributes(tag, tagRows, this.policy),
        sums,
        lineItems: combineKindSums(sums)
      };
    });
  }

  realizedForCategory(category: string): RealizedFigures {
    return computeRealizedFigures(
      this.windows.realized.filter(entry => entry.category === category),
      this.facts.holdings.filter(holding => holding.category === category)
    );
  }

  /**
   * Per-tag realized figures for one category, tags taken from the realized
   * window rows of the category.
   */
  realizedByTag(category: string): RealizedTagFigures[] {
    const categoryRows = this.windows.realized.filter(entry => entry.category === category);
    const categoryHoldings = this.facts.holdings.filter(holding => holding.category === category);

    return distinctTags(categoryRows).map(tag => {
      const tagRows = categoryRows.filter(entry => entry.tag === tag);
      return {
        tag,
        attributes: resolveTagAttributes(tag, tagRows, this.policy),
        ...computeRealizedFigures(
          tagRows,
          categoryHoldings.filter(holding => holding.tag === tag)
        )
      };
    });
  }
}
