import type { EntityKind, InsightLevel } from "../catalog.js";

/** Fixed-point amount in the currency's minor units. */
export interface Money {
  amountMinor: number;
  currency: string;
}

export interface NormalizedAccount {
  kind: "account";
  id: string;
  accountId: string;
  name: string;
  currency: string;
  status: string;
  balance: Money;
  amountSpent: Money;
  /** null when the account has no spend cap */
  spendCap: Money | null;
  timezone: string | null;
}

/**
 * Budgets are minor units of the owning account's currency, which the
 * campaign payload does not carry.
 */
export interface NormalizedCampaign {
  kind: "campaign";
  id: string;
  accountId: string;
  name: string;
  status: string;
  effectiveStatus: string;
  objective: string | null;
  dailyBudgetMinor: number | null;
  lifetimeBudgetMinor: number | null;
  createdTime: string | null;
  updatedTime: string | null;
}

export interface NormalizedAdSet {
  kind: "adset";
  id: string;
  accountId: string;
  campaignId: string;
  name: string;
  status: string;
  effectiveStatus: string;
  dailyBudgetMinor: number | null;
  lifetimeBudgetMinor: number | null;
  optimizationGoal: string | null;
  billingEvent: string | null;
}

export interface NormalizedAd {
  kind: "ad";
  id: string;
  accountId: string;
  campaignId: string;
  adsetId: string;
  name: string;
  status: string;
  effectiveStatus: string;
  creativeId: string | null;
}

export interface InsightRow {
  kind: "insight";
  subject: { level: InsightLevel; id: string };
  accountId: string;
  dateStart: string;
  dateStop: string;
  currency: string;
  spend: Money;
  impressions: number;
  reach: number | null;
  clicks: number;
  frequency: number | null;
  /** Count per action type; empty when the row reports no actions. */
  actions: Record<string, number>;
  conversionType: string | null;
  conversions: number;
  conversionValue: Money;
  /** Percent. */
  ctr: number;
  cpcMinor: number | null;
  cpmMinor: number | null;
  roas: number;
  breakdowns: Record<string, string>;
}

export interface NormalizedCreative {
  kind: "creative";
  id: string;
  name: string | null;
  title: string | null;
  body: string | null;
  imageUrl: string | null;
  videoId: string | null;
  linkUrl: string | null;
  callToActionType: string | null;
}

/**
 * Interest, behavior or demographic usable in a targeting spec. Validation
 * results for unknown interest names carry no id.
 */
export interface TargetingOption {
  kind: "targeting_option";
  id: string | null;
  name: string;
  type: string | null;
  path: string[];
  description: string | null;
  audienceSizeLower: number | null;
  audienceSizeUpper: number | null;
  /** Only set by interest validation. */
  valid: boolean | null;
}

export interface GeoLocation {
  kind: "geo_location";
  key: string;
  name: string;
  type: string;
  countryCode: string | null;
  countryName: string | null;
  region: string | null;
}

export interface AudienceEstimate {
  kind: "audience_estimate";
  usersLowerBound: number | null;
  usersUpperBound: number | null;
  /** Midpoint of the bounds, null when either is missing. */
  estimatedAudienceSize: number | null;
  estimateReady: boolean | null;
}

/** Outcome of a create or update call. */
export interface WriteResult {
  kind: "write_result";
  id: string;
  success: true;
}

export interface EntityByKind {
  account: NormalizedAccount;
  campaign: NormalizedCampaign;
  adset: NormalizedAdSet;
  ad: NormalizedAd;
  insight: InsightRow;
  creative: NormalizedCreative;
  targeting_option: TargetingOption;
  geo_location: GeoLocation;
  audience_estimate: AudienceEstimate;
  write_result: WriteResult;
}

export type NormalizedEntity = EntityByKind[EntityKind];

/**
 * Downstream analysis of normalized insights (recommendations, alerts).
 */
export interface InsightConsumer {
  consume(rows: readonly InsightRow[]): void | Promise<void>;
}
