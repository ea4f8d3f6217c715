import { z } from "zod";

import { GatewayError } from "./errors.js";

export type EntityKind =
  | "account"
  | "campaign"
  | "adset"
  | "ad"
  | "insight"
  | "creative"
  | "targeting_option"
  | "geo_location"
  | "audience_estimate"
  | "write_result";

export type EndpointName =
  | "ad_accounts"
  | "account"
  | "campaigns"
  | "campaign"
  | "adsets"
  | "adset"
  | "ads"
  | "ad"
  | "insights"
  | "ad_creatives"
  | "interest_search"
  | "interest_suggestions"
  | "interest_validation"
  | "behavior_search"
  | "demographic_search"
  | "geo_location_search"
  | "audience_estimate"
  | "campaign_create"
  | "campaign_update";

/** Which kind of id an endpoint is addressed by. */
type IdKind = "none" | "account" | "object" | "account_or_object";

export type InsightLevel = "account" | "campaign" | "adset" | "ad";

export interface EndpointParams {
  fields?: string[];
  limit?: number;
  statuses?: string[];
  date_preset?: string;
  since?: string;
  until?: string;
  level?: InsightLevel;
  breakdowns?: string[];
  time_increment?: number | "monthly" | "all_days";
  query?: string;
  location_types?: string[];
  behavior_class?: string;
  demographic_class?: string;
  interest_list?: string[];
  interest_fbid_list?: string[];
  targeting?: Record<string, unknown>;
  optimization_goal?: string;
  name?: string;
  objective?: string;
  status?: string;
  daily_budget?: number;
  lifetime_budget?: number;
  special_ad_categories?: string[];
}

export interface EndpointDefinition {
  name: EndpointName;
  tool: string;
  description: string;
  entity: EntityKind;
  /** POST endpoints change remote state: never cached, never coalesced. */
  method: "GET" | "POST";
  collection: boolean;
  /** Collections that return their first page only instead of following paging.next. */
  firstPageOnly?: boolean;
  pageSize?: number;
  id: IdKind;
  /** Tool argument carrying the id, when not derived from the entity. */
  idName?: string;
  /** Path of endpoints addressed without an id. */
  path?: string;
  edge?: string;
  /** Query parameters sent with every call, e.g. the search type. */
  fixedParams?: Readonly<Record<string, string>>;
  defaultFields: readonly string[];
  /** Fields the normalizer needs; appended when a caller's field list omits them. */
  requiredFields: readonly string[];
  requiredScopes: readonly string[];
  shape: z.ZodRawShape;
  schema: z.ZodType<EndpointParams, z.ZodTypeDef, unknown>;
  /** List parameters whose order carries no meaning. */
  unorderedParams: readonly string[];
}

const EFFECTIVE_STATUSES = [
  "ACTIVE",
  "PAUSED",
  "DELETED",
  "ARCHIVED",
  "IN_PROCESS",
  "WITH_ISSUES",
  "CAMPAIGN_PAUSED",
  "ADSET_PAUSED",
  "PENDING_REVIEW",
  "DISAPPROVED",
  "PREAPPROVED",
  "PENDING_BILLING_INFO",
] as const;

const DATE_PRESETS = [
  "today",
  "yesterday",
  "this_week_mon_today",
  "this_week_sun_today",
  "last_week_mon_sun",
  "last_week_sun_sat",
  "this_month",
  "last_month",
  "this_quarter",
  "last_quarter",
  "this_year",
  "last_year",
  "last_3d",
  "last_7d",
  "last_14d",
  "last_28d",
  "last_30d",
  "last_90d",
  "maximum",
] as const;

const BREAKDOWNS = [
  "age",
  "gender",
  "country",
  "region",
  "publisher_platform",
  "platform_position",
  "device_platform",
  "impression_device",
] as const;

const LOCATION_TYPES = ["country", "region", "city", "zip", "geo_market", "electoral_district"] as const;
const BEHAVIOR_CLASSES = ["behaviors", "industries", "family_statuses", "life_events"] as const;
const DEMOGRAPHIC_CLASSES = [
  "demographics",
  "life_events",
  "industries",
  "income",
  "family_statuses",
  "user_device",
  "user_os",
] as const;

const OPTIMIZATION_GOALS = [
  "REACH",
  "LINK_CLICKS",
  "IMPRESSIONS",
  "CONVERSIONS",
  "APP_INSTALLS",
  "OFFSITE_CONVERSIONS",
  "LEAD_GENERATION",
  "POST_ENGAGEMENT",
  "PAGE_LIKES",
  "EVENT_RESPONSES",
  "MESSAGES",
  "VIDEO_VIEWS",
  "THRUPLAY",
  "LANDING_PAGE_VIEWS",
] as const;

const CAMPAIGN_OBJECTIVES = [
  "OUTCOME_SALES",
  "OUTCOME_LEADS",
  "OUTCOME_TRAFFIC",
  "OUTCOME_ENGAGEMENT",
  "OUTCOME_APP_PROMOTION",
  "OUTCOME_AWARENESS",
] as const;

const SPECIAL_AD_CATEGORIES = ["CREDIT", "EMPLOYMENT", "HOUSING", "ISSUES_ELECTIONS_POLITICS"] as const;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DEFAULT_PAGE_SIZE = 100;
const DEFAULT_DATE_PRESET = "last_7d";
const READ_SCOPES = ["ads_read"] as const;
const WRITE_SCOPES = ["ads_management"] as const;

const fieldsParam = z
  .array(z.string().regex(/^[a-z_.{}(),0-9]+$/, "invalid field name"))
  .min(1)
  .optional()
  .describe("Fields to request, in order (defaults to a standard field set)");

const limitParam = z.number().int().min(1).max(500).optional().describe("Page size (default 100)");

const statusesParam = z
  .array(z.enum(EFFECTIVE_STATUSES))
  .min(1)
  .optional()
  .describe("Only return objects with these effective statuses");

const singleShape = { fields: fieldsParam };
const singleSchema = z.object(singleShape).strict();

const listShape = { fields: fieldsParam, limit: limitParam, statuses: statusesParam };
const listSchema = z.object(listShape).strict();

const accountListShape = { fields: fieldsParam, limit: limitParam };
const accountListSchema = z.object(accountListShape).strict();

const insightsShape = {
  fields: fieldsParam,
  limit: limitParam,
  date_preset: z.enum(DATE_PRESETS).optional().describe("Relative date range (default last_7d)"),
  since: z.string().regex(ISO_DATE, "must be YYYY-MM-DD").optional().describe("Start date (YYYY-MM-DD)"),
  until: z.string().regex(ISO_DATE, "must be YYYY-MM-DD").optional().describe("End date (YYYY-MM-DD)"),
  level: z.enum(["account", "campaign", "adset", "ad"]).optional().describe("Aggregation level of the rows"),
  breakdowns: z.array(z.enum(BREAKDOWNS)).min(1).optional().describe("Breakdown dimensions, in order"),
  time_increment: z
    .union([z.number().int().min(1).max(90), z.enum(["monthly", "all_days"])])
    .optional()
    .describe("Split rows by this many days, 'monthly' or 'all_days'"),
};
const insightsSchema = z
  .object(insightsShape)
  .strict()
  .superRefine((params, ctx) => {
    const hasRange = params.since !== undefined || params.until !== undefined;
    if (hasRange && (params.since === undefined || params.until === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "since and until must be given together" });
    }
    if (hasRange && params.date_preset !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "use either date_preset or since/until, not both" });
    }
    if (params.since !== undefined && params.until !== undefined && params.since > params.until) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "since must not be after until" });
    }
  });

const searchLimit = (fallback: number) =>
  z.number().int().min(1).max(1000).optional().describe(`Maximum number of results (default ${fallback})`);

const queryParam = z.string().trim().min(1).describe("Search term");

const interestSearchShape = { query: queryParam, limit: searchLimit(25) };
const interestSearchSchema = z.object(interestSearchShape).strict();

const geoLocationSearchShape = {
  query: queryParam,
  location_types: z.array(z.enum(LOCATION_TYPES)).min(1).optional().describe("Location types to search (default all)"),
  limit: searchLimit(25),
};
const geoLocationSearchSchema = z.object(geoLocationSearchShape).strict();

const behaviorSearchShape = {
  behavior_class: z.enum(BEHAVIOR_CLASSES).optional().describe("Behavior class (default behaviors)"),
  limit: searchLimit(50),
};
const behaviorSearchSchema = z.object(behaviorSearchShape).strict();

const demographicSearchShape = {
  demographic_class: z.enum(DEMOGRAPHIC_CLASSES).optional().describe("Demographic class (default demographics)"),
  limit: searchLimit(50),
};
const demographicSearchSchema = z.object(demographicSearchShape).strict();

const interestNames = z.array(z.string().trim().min(1)).min(1);

const interestSuggestionsShape = {
  interest_list: interestNames.describe("Interest names to find related interests for"),
  limit: searchLimit(25),
};
const interestSuggestionsSchema = z.object(interestSuggestionsShape).strict();

const interestValidationShape = {
  interest_list: interestNames.optional().describe("Interest names to validate"),
  interest_fbid_list: z.array(z.string().regex(/^\d+$/, "must be numeric")).min(1).optional().describe("Interest ids to validate"),
};
const interestValidationSchema = z
  .object(interestValidationShape)
  .strict()
  .refine((params) => params.interest_list !== undefined || params.interest_fbid_list !== undefined, {
    message: "give interest_list, interest_fbid_list or both",
  });

const audienceEstimateShape = {
  targeting: z.record(z.unknown()).describe("Targeting spec, e.g. { geo_locations: { countries: ['US'] } }"),
  optimization_goal: z.enum(OPTIMIZATION_GOALS).optional().describe("Optimization goal (default REACH)"),
};
const audienceEstimateSchema = z.object(audienceEstimateShape).strict();

const budgetParam = (label: string) =>
  z.number().int().positive().optional().describe(`${label} in minor units of the account currency (cents for USD)`);

const campaignCreateShape = {
  name: z.string().trim().min(1).describe("Campaign name"),
  objective: z.enum(CAMPAIGN_OBJECTIVES).describe("Campaign objective"),
  status: z.enum(["ACTIVE", "PAUSED"]).optional().describe("Initial status (default PAUSED)"),
  daily_budget: budgetParam("Daily budget"),
  lifetime_budget: budgetParam("Lifetime budget"),
  special_ad_categories: z
    .array(z.enum(SPECIAL_AD_CATEGORIES))
    .optional()
    .describe("Special ad categories (default none)"),
};
const campaignCreateSchema = z
  .object(campaignCreateShape)
  .strict()
  .refine((params) => params.daily_budget === undefined || params.lifetime_budget === undefined, {
    message: "use either daily_budget or lifetime_budget, not both",
  });

const campaignUpdateShape = {
  name: z.string().trim().min(1).optional().describe("New campaign name"),
  status: z.enum(["ACTIVE", "PAUSED", "DELETED", "ARCHIVED"]).optional().describe("New status"),
  daily_budget: budgetParam("New daily budget"),
  lifetime_budget: budgetParam("New lifetime budget"),
};
const campaignUpdateSchema = z
  .object(campaignUpdateShape)
  .strict()
  .refine((params) => Object.values(params).some((value) => value !== undefined), {
    message: "give at least one of name, status, daily_budget, lifetime_budget",
  });

const ACCOUNT_FIELDS = [
  "id",
  "account_id",
  "name",
  "currency",
  "account_status",
  "balance",
  "amount_spent",
  "spend_cap",
  "timezone_name",
] as const;
const ACCOUNT_REQUIRED = ["id", "account_id", "name", "currency", "account_status", "balance", "amount_spent"] as const;

const CAMPAIGN_FIELDS = [
  "id",
  "account_id",
  "name",
  "status",
  "effective_status",
  "objective",
  "daily_budget",
  "lifetime_budget",
  "created_time",
  "updated_time",
] as const;
const CAMPAIGN_REQUIRED = ["id", "account_id", "name", "status", "effective_status"] as const;

const ADSET_FIELDS = [
  "id",
  "account_id",
  "campaign_id",
  "name",
  "status",
  "effective_status",
  "daily_budget",
  "lifetime_budget",
  "optimization_goal",
  "billing_event",
] as const;
const ADSET_REQUIRED = ["id", "account_id", "campaign_id", "name", "status", "effective_status"] as const;

const AD_FIELDS = [
  "id",
  "account_id",
  "campaign_id",
  "adset_id",
  "name",
  "status",
  "effective_status",
  "creative",
] as const;
const AD_REQUIRED = ["id", "account_id", "campaign_id", "adset_id", "name", "status", "effective_status"] as const;

const INSIGHT_FIELDS = [
  "account_id",
  "account_currency",
  "spend",
  "impressions",
  "reach",
  "clicks",
  "frequency",
  "actions",
  "action_values",
] as const;
const INSIGHT_REQUIRED = ["account_id", "account_currency", "spend", "impressions", "clicks"] as const;

const CREATIVE_FIELDS = [
  "id",
  "name",
  "title",
  "body",
  "image_url",
  "video_id",
  "link_url",
  "call_to_action_type",
] as const;

const ENDPOINTS: Record<EndpointName, EndpointDefinition> = {
  ad_accounts: {
    name: "ad_accounts",
    tool: "get_ad_accounts",
    description: "List every ad account the connected credential can access (all pages).",
    entity: "account",
    method: "GET",
    collection: true,
    id: "none",
    path: "me/adaccounts",
    defaultFields: ACCOUNT_FIELDS,
    requiredFields: ACCOUNT_REQUIRED,
    requiredScopes: READ_SCOPES,
    shape: accountListShape,
    schema: accountListSchema,
    unorderedParams: [],
  },
  account: {
    name: "account",
    tool: "get_account_info",
    description: "Get details of one ad account (currency, status, balance, amount spent).",
    entity: "account",
    method: "GET",
    collection: false,
    id: "account",
    defaultFields: ACCOUNT_FIELDS,
    requiredFields: ACCOUNT_REQUIRED,
    requiredScopes: READ_SCOPES,
    shape: singleShape,
    schema: singleSchema,
    unorderedParams: [],
  },
  campaigns: {
    name: "campaigns",
    tool: "get_campaigns",
    description: "List campaigns of an ad account, optionally filtered by effective status.",
    entity: "campaign",
    method: "GET",
    collection: true,
    id: "account",
    edge: "campaigns",
    defaultFields: CAMPAIGN_FIELDS,
    requiredFields: CAMPAIGN_REQUIRED,
    requiredScopes: READ_SCOPES,
    shape: listShape,
    schema: listSchema,
    unorderedParams: ["statuses"],
  },
  campaign: {
    name: "campaign",
    tool: "get_campaign_details",
    description: "Get details of one campaign (objective, budgets, status).",
    entity: "campaign",
    method: "GET",
    collection: false,
    id: "object",
    defaultFields: CAMPAIGN_FIELDS,
    requiredFields: CAMPAIGN_REQUIRED,
    requiredScopes: READ_SCOPES,
    shape: singleShape,
    schema: singleSchema,
    unorderedParams: [],
  },
  adsets: {
    name: "adsets",
    tool: "get_adsets",
    description: "List ad sets of an ad account (act_...) or a campaign.",
    entity: "adset",
    method: "GET",
    collection: true,
    id: "account_or_object",
    edge: "adsets",
    defaultFields: ADSET_FIELDS,
    requiredFields: ADSET_REQUIRED,
    requiredScopes: READ_SCOPES,
    shape: listShape,
    schema: listSchema,
    unorderedParams: ["statuses"],
  },
  adset: {
    name: "adset",
    tool: "get_adset_details",
    description: "Get details of one ad set.",
    entity: "adset",
    method: "GET",
    collection: false,
    id: "object",
    defaultFields: ADSET_FIELDS,
    requiredFields: ADSET_REQUIRED,
    requiredScopes: READ_SCOPES,
    shape: singleShape,
    schema: singleSchema,
    unorderedParams: [],
  },
  ads: {
    name: "ads",
    tool: "get_ads",
    description: "List ads of an ad account (act_...), a campaign or an ad set.",
    entity: "ad",
    method: "GET",
    collection: true,
    id: "account_or_object",
    edge: "ads",
    defaultFields: AD_FIELDS,
    requiredFields: AD_REQUIRED,
    requiredScopes: READ_SCOPES,
    shape: listShape,
    schema: listSchema,
    unorderedParams: ["statuses"],
  },
  ad: {
    name: "ad",
    tool: "get_ad_details",
    description: "Get details of one ad.",
    entity: "ad",
    method: "GET",
    collection: false,
    id: "object",
    defaultFields: AD_FIELDS,
    requiredFields: AD_REQUIRED,
    requiredScopes: READ_SCOPES,
    shape: singleShape,
    schema: singleSchema,
    unorderedParams: [],
  },
  insights: {
    name: "insights",
    tool: "get_insights",
    description:
      "Get performance insights (spend, impressions, clicks, conversions, CTR, CPC, CPM, ROAS) for an account, campaign, ad set or ad.",
    entity: "insight",
    method: "GET",
    collection: true,
    id: "account_or_object",
    edge: "insights",
    defaultFields: INSIGHT_FIELDS,
    requiredFields: INSIGHT_REQUIRED,
    requiredScopes: READ_SCOPES,
    shape: insightsShape,
    schema: insightsSchema,
    unorderedParams: [],
  },
  ad_creatives: {
    name: "ad_creatives",
    tool: "get_ad_creatives",
    description: "Get the creatives (title, body, image, link, call to action) of one ad.",
    entity: "creative",
    method: "GET",
    collection: true,
    id: "object",
    idName: "ad_id",
    edge: "creatives",
    defaultFields: CREATIVE_FIELDS,
    requiredFields: ["id"],
    requiredScopes: READ_SCOPES,
    shape: singleShape,
    schema: singleSchema,
    unorderedParams: [],
  },
  interest_search: {
    name: "interest_search",
    tool: "search_interests",
    description: "Search interest targeting options by keyword, with audience size ranges.",
    entity: "targeting_option",
    method: "GET",
    collection: true,
    firstPageOnly: true,
    pageSize: 25,
    id: "none",
    path: "search",
    fixedParams: { type: "adinterest" },
    defaultFields: [],
    requiredFields: [],
    requiredScopes: READ_SCOPES,
    shape: interestSearchShape,
    schema: interestSearchSchema,
    unorderedParams: [],
  },
  interest_suggestions: {
    name: "interest_suggestions",
    tool: "get_interest_suggestions",
    description: "Suggest interests related to a list of interest names.",
    entity: "targeting_option",
    method: "GET",
    collection: true,
    firstPageOnly: true,
    pageSize: 25,
    id: "none",
    path: "search",
    fixedParams: { type: "adinterestsuggestion" },
    defaultFields: [],
    requiredFields: [],
    requiredScopes: READ_SCOPES,
    shape: interestSuggestionsShape,
    schema: interestSuggestionsSchema,
    unorderedParams: [],
  },
  interest_validation: {
    name: "interest_validation",
    tool: "validate_interests",
    description: "Check whether interest names or ids can still be used for targeting.",
    entity: "targeting_option",
    method: "GET",
    collection: true,
    firstPageOnly: true,
    id: "none",
    path: "search",
    fixedParams: { type: "adinterestvalid" },
    defaultFields: [],
    requiredFields: [],
    requiredScopes: READ_SCOPES,
    shape: interestValidationShape,
    schema: interestValidationSchema,
    unorderedParams: ["interest_list", "interest_fbid_list"],
  },
  behavior_search: {
    name: "behavior_search",
    tool: "search_behaviors",
    description: "List behavior targeting options of one class (behaviors, industries, family statuses, life events).",
    entity: "targeting_option",
    method: "GET",
    collection: true,
    firstPageOnly: true,
    pageSize: 50,
    id: "none",
    path: "search",
    fixedParams: { type: "adTargetingCategory" },
    defaultFields: [],
    requiredFields: [],
    requiredScopes: READ_SCOPES,
    shape: behaviorSearchShape,
    schema: behaviorSearchSchema,
    unorderedParams: [],
  },
  demographic_search: {
    name: "demographic_search",
    tool: "search_demographics",
    description: "List demographic targeting options of one class (demographics, income, life events, devices...).",
    entity: "targeting_option",
    method: "GET",
    collection: true,
    firstPageOnly: true,
    pageSize: 50,
    id: "none",
    path: "search",
    fixedParams: { type: "adTargetingCategory" },
    defaultFields: [],
    requiredFields: [],
    requiredScopes: READ_SCOPES,
    shape: demographicSearchShape,
    schema: demographicSearchSchema,
    unorderedParams: [],
  },
  geo_location_search: {
    name: "geo_location_search",
    tool: "search_geo_locations",
    description: "Search countries, regions, cities and other locations for geographic targeting.",
    entity: "geo_location",
    method: "GET",
    collection: true,
    firstPageOnly: true,
    pageSize: 25,
    id: "none",
    path: "search",
    fixedParams: { type: "adgeolocation" },
    defaultFields: [],
    requiredFields: [],
    requiredScopes: READ_SCOPES,
    shape: geoLocationSearchShape,
    schema: geoLocationSearchSchema,
    unorderedParams: ["location_types"],
  },
  audience_estimate: {
    name: "audience_estimate",
    tool: "estimate_audience_size",
    description: "Estimate the audience size of a targeting spec for an ad account.",
    entity: "audience_estimate",
    method: "GET",
    collection: false,
    id: "account",
    edge: "reachestimate",
    defaultFields: [],
    requiredFields: [],
    requiredScopes: READ_SCOPES,
    shape: audienceEstimateShape,
    schema: audienceEstimateSchema,
    unorderedParams: [],
  },
  campaign_create: {
    name: "campaign_create",
    tool: "create_campaign",
    description:
      "Create a campaign in an ad account. Budgets are minor units of the account currency. New campaigns start PAUSED unless status is given.",
    entity: "write_result",
    method: "POST",
    collection: false,
    id: "account",
    edge: "campaigns",
    defaultFields: [],
    requiredFields: [],
    requiredScopes: WRITE_SCOPES,
    shape: campaignCreateShape,
    schema: campaignCreateSchema,
    unorderedParams: [],
  },
  campaign_update: {
    name: "campaign_update",
    tool: "update_campaign",
    description: "Change the name, status or budget of a campaign. Budgets are minor units of the account currency.",
    entity: "write_result",
    method: "POST",
    collection: false,
    id: "object",
    idName: "campaign_id",
    defaultFields: [],
    requiredFields: [],
    requiredScopes: WRITE_SCOPES,
    shape: campaignUpdateShape,
    schema: campaignUpdateSchema,
    unorderedParams: [],
  },
};

function isEndpointName(name: string): name is EndpointName {
  return Object.hasOwn(ENDPOINTS, name);
}

export function getEndpoint(name: string): EndpointDefinition | undefined {
  return isEndpointName(name) ? ENDPOINTS[name] : undefined;
}

export function listEndpoints(): EndpointDefinition[] {
  return Object.values(ENDPOINTS);
}

/**
 * Ensure an ad account id carries the act_ prefix.
 */
export function normalizeAccountId(accountId: string): string {
  const trimmed = accountId.trim();
  if (trimmed.startsWith("act_")) return trimmed;
  return /^\d+$/.test(trimmed) ? `act_${trimmed}` : trimmed;
}

/**
 * Canonical object id for an endpoint, or null for endpoints without one.
 * Throws InvalidRequest for ids the endpoint cannot be addressed by.
 */
export function resolveObjectId(def: EndpointDefinition, objectId: string | undefined): string | null {
  if (def.id === "none") return null;

  const raw = objectId?.trim();
  if (!raw) {
    throw new GatewayError("InvalidRequest", `Endpoint ${def.name} requires an object id`);
  }

  switch (def.id) {
    case "account": {
      const id = normalizeAccountId(raw);
      if (!/^act_\d+$/.test(id)) {
        throw new GatewayError("InvalidRequest", `Invalid ad account id: ${raw}`, {
          expected: "act_<digits> or <digits>",
        });
      }
      return id;
    }
    case "object":
      if (!/^\d+$/.test(raw)) {
        throw new GatewayError("InvalidRequest", `Invalid object id: ${raw}`, { expected: "<digits>" });
      }
      return raw;
    case "account_or_object":
      if (!/^(act_)?\d+$/.test(raw)) {
        throw new GatewayError("InvalidRequest", `Invalid object id: ${raw}`, {
          expected: "act_<digits> or <digits>",
        });
      }
      return raw;
  }
}

export function graphPath(def: EndpointDefinition, objectId: string | null): string {
  if (objectId === null) {
    if (!def.path) throw new GatewayError("InvalidRequest", `Endpoint ${def.name} requires an object id`);
    return def.path;
  }
  return def.edge ? `${objectId}/${def.edge}` : objectId;
}

export function validateParams(def: EndpointDefinition, params: Record<string, unknown>): EndpointParams {
  const parsed = def.schema.safeParse(params);
  if (!parsed.success) {
    throw new GatewayError("InvalidRequest", `Invalid parameters for ${def.name}`, {
      issues: parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    });
  }
  return parsed.data;
}

/** Id fields that name the subject of an insight row queried on a non-account object. */
const SUBJECT_ID_FIELDS = ["campaign_id", "adset_id", "ad_id"] as const;

function resolveFields(def: EndpointDefinition, params: EndpointParams, objectId: string | null): string[] {
  const fields = [...(params.fields ?? def.defaultFields)];
  const required = [...def.requiredFields];
  if (def.entity === "insight") {
    if (params.level && params.level !== "account") {
      required.push(`${params.level}_id`);
    } else if (!params.level && objectId !== null && !objectId.startsWith("act_")) {
      required.push(...SUBJECT_ID_FIELDS);
    }
  }
  for (const field of required) {
    if (!fields.includes(field)) fields.push(field);
  }
  return fields;
}

/**
 * Translate validated parameters into Graph API query parameters (GET) or
 * form fields (POST).
 */
export function buildGraphParams(
  def: EndpointDefinition,
  params: EndpointParams,
  objectId: string | null,
): Record<string, string> {
  const query: Record<string, string> = { ...def.fixedParams };

  if (def.method === "POST") {
    return { ...query, ...writeFields(def, params) };
  }

  const fields = resolveFields(def, params, objectId);
  if (fields.length > 0) query.fields = fields.join(",");

  if (def.collection) {
    query.limit = String(params.limit ?? def.pageSize ?? DEFAULT_PAGE_SIZE);
  }
  if (params.statuses) {
    query.filtering = JSON.stringify([
      { field: "effective_status", operator: "IN", value: [...params.statuses].sort() },
    ]);
  }

  if (def.entity === "insight") {
    if (params.since !== undefined && params.until !== undefined) {
      query.time_range = JSON.stringify({ since: params.since, until: params.until });
    } else {
      query.date_preset = params.date_preset ?? DEFAULT_DATE_PRESET;
    }
    if (params.level) query.level = params.level;
    if (params.breakdowns) query.breakdowns = params.breakdowns.join(",");
    if (params.time_increment !== undefined) query.time_increment = String(params.time_increment);
  }

  if (params.query !== undefined) query.q = params.query;
  if (params.location_types) query.location_types = JSON.stringify(params.location_types);
  if (def.name === "behavior_search") query.class = params.behavior_class ?? "behaviors";
  if (def.name === "demographic_search") query.class = params.demographic_class ?? "demographics";
  if (params.interest_list) query.interest_list = JSON.stringify(params.interest_list);
  if (params.interest_fbid_list) query.interest_fbid_list = JSON.stringify(params.interest_fbid_list);
  if (params.targeting) {
    query.targeting_spec = JSON.stringify(params.targeting);
    query.optimization_goal = params.optimization_goal ?? "REACH";
  }

  return query;
}

function writeFields(def: EndpointDefinition, params: EndpointParams): Record<string, string> {
  const body: Record<string, string> = {};
  if (params.name !== undefined) body.name = params.name;
  if (params.objective !== undefined) body.objective = params.objective;
  if (params.daily_budget !== undefined) body.daily_budget = String(params.daily_budget);
  if (params.lifetime_budget !== undefined) body.lifetime_budget = String(params.lifetime_budget);

  if (def.name === "campaign_create") {
    body.status = params.status ?? "PAUSED";
    // Graph rejects campaign creation without this field, even when empty.
    body.special_ad_categories = JSON.stringify(params.special_ad_categories ?? []);
  } else if (params.status !== undefined) {
    body.status = params.status;
  }
  return body;
}
