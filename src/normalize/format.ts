import { currencyExponent, minorToDecimal } from "./money.js";
import type { InsightRow, Money } from "./types.js";

/**
 * Display rendering of normalized values. Rounding happens here only; the
 * entities themselves keep full precision.
 */

export function formatMoney(money: Money): string {
  return `${minorToDecimal(money.amountMinor, currencyExponent(money.currency))} ${money.currency}`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function formatRatio(value: number): string {
  return value.toFixed(2);
}

function formatMinor(amountMinor: number | null, currency: string): string {
  if (amountMinor === null) return "n/a";
  return formatMoney({ amountMinor: Math.round(amountMinor), currency });
}

export interface InsightDisplay {
  subject: string;
  date_range: string;
  spend: string;
  impressions: string;
  clicks: string;
  ctr: string;
  cpc: string;
  cpm: string;
  conversions: string;
  conversion_value: string;
  roas: string;
}

export function formatInsightRow(row: InsightRow): InsightDisplay {
  return {
    subject: `${row.subject.level} ${row.subject.id}`,
    date_range: `${row.dateStart} to ${row.dateStop}`,
    spend: formatMoney(row.spend),
    impressions: row.impressions.toLocaleString("en-US"),
    clicks: row.clicks.toLocaleString("en-US"),
    ctr: formatPercent(row.ctr),
    cpc: formatMinor(row.cpcMinor, row.currency),
    cpm: formatMinor(row.cpmMinor, row.currency),
    conversions: row.conversionType ? `${row.conversions} (${row.conversionType})` : "0",
    conversion_value: formatMoney(row.conversionValue),
    roas: formatRatio(row.roas),
  };
}
