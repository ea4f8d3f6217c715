import { z } from "zod";

import { type EntityKind, type InsightLevel, normalizeAccountId } from "../catalog.js";
import { GatewayError } from "../errors.js";
import { currencyExponent, decimalToMinor } from "./money.js";
import type {
  AudienceEstimate,
  EntityByKind,
  GeoLocation,
  InsightRow,
  NormalizedAccount,
  NormalizedAd,
  NormalizedAdSet,
  NormalizedCampaign,
  NormalizedCreative,
  TargetingOption,
  WriteResult,
} from "./types.js";

// =============================================================================
// Raw payload schemas - Graph returns most numbers as strings
// =============================================================================

const integer = z
  .union([z.string().regex(/^-?\d+$/, "expected an integer"), z.number().int()])
  .transform(Number);

const decimal = z
  .union([z.string(), z.number().finite()])
  .transform(String)
  .pipe(z.string().regex(/^-?\d+(\.\d+)?$/, "expected a decimal number"));

const id = z.union([z.string().min(1), z.number().int()]).transform(String);

const actionList = z.array(z.object({ action_type: z.string(), value: decimal }));

const rawAccount = z.object({
  id: z.string().min(1),
  account_id: id,
  name: z.string(),
  currency: z.string().length(3),
  account_status: z.number().int(),
  balance: integer,
  amount_spent: integer,
  spend_cap: integer.optional(),
  timezone_name: z.string().optional(),
});

const rawCampaign = z.object({
  id,
  account_id: id,
  name: z.string(),
  status: z.string(),
  effective_status: z.string(),
  objective: z.string().optional(),
  daily_budget: integer.optional(),
  lifetime_budget: integer.optional(),
  created_time: z.string().optional(),
  updated_time: z.string().optional(),
});

const rawAdSet = z.object({
  id,
  account_id: id,
  campaign_id: id,
  name: z.string(),
  status: z.string(),
  effective_status: z.string(),
  daily_budget: integer.optional(),
  lifetime_budget: integer.optional(),
  optimization_goal: z.string().optional(),
  billing_event: z.string().optional(),
});

const rawAd = z.object({
  id,
  account_id: id,
  campaign_id: id,
  adset_id: id,
  name: z.string(),
  status: z.string(),
  effective_status: z.string(),
  creative: z.object({ id }).optional(),
});

const BREAKDOWN_KEYS = [
  "age",
  "gender",
  "country",
  "region",
  "publisher_platform",
  "platform_position",
  "device_platform",
  "impression_device",
] as const;

const rawInsight = z.object({
  account_id: id,
  account_currency: z.string().length(3),
  campaign_id: id.optional(),
  adset_id: id.optional(),
  ad_id: id.optional(),
  date_start: z.string(),
  date_stop: z.string(),
  spend: decimal,
  impressions: integer,
  reach: integer.optional(),
  clicks: integer,
  frequency: decimal.optional(),
  actions: actionList.optional(),
  action_values: actionList.optional(),
  age: z.string().optional(),
  gender: z.string().optional(),
  country: z.string().optional(),
  region: z.string().optional(),
  publisher_platform: z.string().optional(),
  platform_position: z.string().optional(),
  device_platform: z.string().optional(),
  impression_device: z.string().optional(),
});

const rawCreative = z.object({
  id,
  name: z.string().optional(),
  title: z.string().optional(),
  body: z.string().optional(),
  image_url: z.string().optional(),
  video_id: id.optional(),
  link_url: z.string().optional(),
  call_to_action_type: z.string().optional(),
});

const rawTargetingOption = z.object({
  id: id.optional(),
  name: z.string(),
  type: z.string().optional(),
  path: z.array(z.string()).optional(),
  description: z.string().optional(),
  audience_size: integer.optional(),
  audience_size_lower_bound: integer.optional(),
  audience_size_upper_bound: integer.optional(),
  valid: z.boolean().optional(),
});

const rawGeoLocation = z.object({
  key: id,
  name: z.string(),
  type: z.string(),
  country_code: z.string().optional(),
  country_name: z.string().optional(),
  region: z.string().optional(),
});

const rawAudienceEstimate = z.object({
  data: z.object({
    users_lower_bound: integer.optional(),
    users_upper_bound: integer.optional(),
    estimate_mau_lower_bound: integer.optional(),
    estimate_mau_upper_bound: integer.optional(),
    estimate_ready: z.boolean().optional(),
  }),
});

const rawWriteResult = z.object({
  id: id.optional(),
  success: z.boolean().optional(),
});

const rawPage = z.object({
  data: z.array(z.unknown()),
  paging: z.object({ next: z.string().url().optional() }).optional(),
});

// =============================================================================
// Entity normalizers
// =============================================================================

const ACCOUNT_STATUSES: Record<number, string> = {
  1: "ACTIVE",
  2: "DISABLED",
  3: "UNSETTLED",
  7: "PENDING_RISK_REVIEW",
  8: "PENDING_SETTLEMENT",
  9: "IN_GRACE_PERIOD",
  100: "PENDING_CLOSURE",
  101: "CLOSED",
  201: "ANY_ACTIVE",
  202: "ANY_CLOSED",
};

/** Action types counted as conversions, most specific first. */
export const CONVERSION_PRIORITY = [
  "omni_purchase",
  "purchase",
  "offsite_conversion.fb_pixel_purchase",
  "lead",
] as const;

function parse<T extends z.ZodTypeAny>(schema: T, raw: unknown, kind: string): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new GatewayError("MalformedResponse", `Remote ${kind} payload does not match the expected shape`, {
      issues: result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    });
  }
  return result.data;
}

function normalizeAccount(raw: unknown): NormalizedAccount {
  const account = parse(rawAccount, raw, "account");
  const currency = account.currency.toUpperCase();
  return {
    kind: "account",
    id: normalizeAccountId(account.id),
    accountId: account.account_id,
    name: account.name,
    currency,
    status: ACCOUNT_STATUSES[account.account_status] ?? `UNKNOWN_${account.account_status}`,
    balance: { amountMinor: account.balance, currency },
    amountSpent: { amountMinor: account.amount_spent, currency },
    spendCap: account.spend_cap ? { amountMinor: account.spend_cap, currency } : null,
    timezone: account.timezone_name ?? null,
  };
}

function normalizeCampaign(raw: unknown): NormalizedCampaign {
  const campaign = parse(rawCampaign, raw, "campaign");
  return {
    kind: "campaign",
    id: campaign.id,
    accountId: normalizeAccountId(campaign.account_id),
    name: campaign.name,
    status: campaign.status,
    effectiveStatus: campaign.effective_status,
    objective: campaign.objective ?? null,
    dailyBudgetMinor: campaign.daily_budget ?? null,
    lifetimeBudgetMinor: campaign.lifetime_budget ?? null,
    createdTime: campaign.created_time ?? null,
    updatedTime: campaign.updated_time ?? null,
  };
}

function normalizeAdSet(raw: unknown): NormalizedAdSet {
  const adset = parse(rawAdSet, raw, "adset");
  return {
    kind: "adset",
    id: adset.id,
    accountId: normalizeAccountId(adset.account_id),
    campaignId: adset.campaign_id,
    name: adset.name,
    status: adset.status,
    effectiveStatus: adset.effective_status,
    dailyBudgetMinor: adset.daily_budget ?? null,
    lifetimeBudgetMinor: adset.lifetime_budget ?? null,
    optimizationGoal: adset.optimization_goal ?? null,
    billingEvent: adset.billing_event ?? null,
  };
}

function normalizeAd(raw: unknown): NormalizedAd {
  const ad = parse(rawAd, raw, "ad");
  return {
    kind: "ad",
    id: ad.id,
    accountId: normalizeAccountId(ad.account_id),
    campaignId: ad.campaign_id,
    adsetId: ad.adset_id,
    name: ad.name,
    status: ad.status,
    effectiveStatus: ad.effective_status,
    creativeId: ad.creative?.id ?? null,
  };
}

function normalizeCreative(raw: unknown): NormalizedCreative {
  const creative = parse(rawCreative, raw, "creative");
  return {
    kind: "creative",
    id: creative.id,
    name: creative.name ?? null,
    title: creative.title ?? null,
    body: creative.body ?? null,
    imageUrl: creative.image_url ?? null,
    videoId: creative.video_id ?? null,
    linkUrl: creative.link_url ?? null,
    callToActionType: creative.call_to_action_type ?? null,
  };
}

function normalizeTargetingOption(raw: unknown): TargetingOption {
  const option = parse(rawTargetingOption, raw, "targeting option");
  return {
    kind: "targeting_option",
    id: option.id ?? null,
    name: option.name,
    type: option.type ?? null,
    path: option.path ?? [],
    description: option.description ?? null,
    audienceSizeLower: option.audience_size_lower_bound ?? option.audience_size ?? null,
    audienceSizeUpper: option.audience_size_upper_bound ?? option.audience_size ?? null,
    valid: option.valid ?? null,
  };
}

function normalizeGeoLocation(raw: unknown): GeoLocation {
  const location = parse(rawGeoLocation, raw, "geo location");
  return {
    kind: "geo_location",
    key: location.key,
    name: location.name,
    type: location.type,
    countryCode: location.country_code ?? null,
    countryName: location.country_name ?? null,
    region: location.region ?? null,
  };
}

function normalizeAudienceEstimate(raw: unknown): AudienceEstimate {
  const { data } = parse(rawAudienceEstimate, raw, "audience estimate");
  const lower = data.users_lower_bound ?? data.estimate_mau_lower_bound ?? null;
  const upper = data.users_upper_bound ?? data.estimate_mau_upper_bound ?? null;
  return {
    kind: "audience_estimate",
    usersLowerBound: lower,
    usersUpperBound: upper,
    estimatedAudienceSize: lower !== null && upper !== null ? Math.floor((lower + upper) / 2) : null,
    estimateReady: data.estimate_ready ?? null,
  };
}

/** Creates answer with the new id, updates with `{ success }` only. */
function normalizeWriteResult(raw: unknown, context: NormalizeContext): WriteResult {
  const result = parse(rawWriteResult, raw, "write result");
  if (result.success === false) {
    throw new GatewayError("PermanentFailure", "Remote API did not apply the change", {
      object_id: context.objectId,
    });
  }
  const writtenId = result.id ?? context.objectId;
  if (writtenId === null) {
    throw new GatewayError("MalformedResponse", "Remote write result carries no object id");
  }
  return { kind: "write_result", id: writtenId, success: true };
}

function actionTotals(list: z.output<typeof actionList> | undefined): Map<string, string> {
  const totals = new Map<string, string>();
  for (const action of list ?? []) {
    totals.set(action.action_type, action.value);
  }
  return totals;
}

function normalizeInsight(raw: unknown): InsightRow {
  const row = parse(rawInsight, raw, "insight");
  const currency = row.account_currency.toUpperCase();
  const exponent = currencyExponent(currency);
  const accountId = normalizeAccountId(row.account_id);

  let subject: { level: InsightLevel; id: string } = { level: "account", id: accountId };
  if (row.ad_id) subject = { level: "ad", id: row.ad_id };
  else if (row.adset_id) subject = { level: "adset", id: row.adset_id };
  else if (row.campaign_id) subject = { level: "campaign", id: row.campaign_id };

  const counts = actionTotals(row.actions);
  const values = actionTotals(row.action_values);
  const actions: Record<string, number> = {};
  for (const [type, value] of counts) {
    actions[type] = Number(value);
  }

  const conversionType = CONVERSION_PRIORITY.find((type) => counts.has(type) || values.has(type)) ?? null;
  const conversions = conversionType ? Number(counts.get(conversionType) ?? "0") : 0;
  const conversionValueMinor = conversionType ? decimalToMinor(values.get(conversionType) ?? "0", exponent) : 0;

  const spendMinor = decimalToMinor(row.spend, exponent);
  const { impressions, clicks } = row;

  const breakdowns: Record<string, string> = {};
  for (const key of BREAKDOWN_KEYS) {
    const value = row[key];
    if (value !== undefined) breakdowns[key] = value;
  }

  return {
    kind: "insight",
    subject,
    accountId,
    dateStart: row.date_start,
    dateStop: row.date_stop,
    currency,
    spend: { amountMinor: spendMinor, currency },
    impressions,
    reach: row.reach ?? null,
    clicks,
    frequency: row.frequency !== undefined ? Number(row.frequency) : null,
    actions,
    conversionType,
    conversions,
    conversionValue: { amountMinor: conversionValueMinor, currency },
    ctr: impressions > 0 ? (clicks / impressions) * 100 : 0,
    cpcMinor: clicks > 0 ? spendMinor / clicks : null,
    cpmMinor: impressions > 0 ? (spendMinor / impressions) * 1000 : null,
    roas: spendMinor > 0 ? conversionValueMinor / spendMinor : 0,
    breakdowns,
  };
}

const NORMALIZERS: { [K in EntityKind]: (raw: unknown, context: NormalizeContext) => EntityByKind[K] } = {
  account: normalizeAccount,
  campaign: normalizeCampaign,
  adset: normalizeAdSet,
  ad: normalizeAd,
  insight: normalizeInsight,
  creative: normalizeCreative,
  targeting_option: normalizeTargetingOption,
  geo_location: normalizeGeoLocation,
  audience_estimate: normalizeAudienceEstimate,
  write_result: normalizeWriteResult,
};

// =============================================================================
// Public API
// =============================================================================

/** What the payload was requested for. */
export interface NormalizeContext {
  objectId: string | null;
}

const NO_CONTEXT: NormalizeContext = { objectId: null };

/**
 * Map one raw Graph object to its canonical entity.
 * Throws MalformedResponse when a required field is missing or mistyped.
 */
export function normalize<K extends EntityKind>(
  raw: unknown,
  kind: K,
  context: NormalizeContext = NO_CONTEXT,
): EntityByKind[K] {
  const normalizer: (raw: unknown, context: NormalizeContext) => EntityByKind[K] = NORMALIZERS[kind];
  return normalizer(raw, context);
}

export function normalizeMany<K extends EntityKind>(
  items: readonly unknown[],
  kind: K,
  context: NormalizeContext = NO_CONTEXT,
): EntityByKind[K][] {
  return items.map((item, index) => {
    try {
      return normalize(item, kind, context);
    } catch (error) {
      if (error instanceof GatewayError && error.details) {
        throw new GatewayError(error.kind, `${error.message} (item ${index})`, { ...error.details, index });
      }
      throw error;
    }
  });
}

export interface GraphPage {
  items: unknown[];
  next: string | null;
}

/**
 * Split a Graph collection response into its items and next-page URL.
 */
export function parsePage(body: unknown): GraphPage {
  const page = parse(rawPage, body, "page");
  return { items: page.data, next: page.paging?.next ?? null };
}
