import type { DimensionCapability, IntentCapability, MetricCapability } from "./types";

export const METRIC_DEFINITIONS: MetricCapability[] = [
  // Daily aggregates (ub.daily_metrics)
  {
    key: "pv",
    description: "Page views per day",
    synonyms: ["page views", "pageviews", "views"],
    supported: true,
    source: "daily_metrics",
    column: "pv",
  },
  {
    key: "uv",
    description: "Unique visitors per day",
    synonyms: ["unique visitors", "visitors", "traffic", "users"],
    supported: true,
    source: "daily_metrics",
    column: "uv",
  },
  {
    key: "buyers",
    description: "Distinct users with a purchase event per day",
    synonyms: ["buyer", "purchasers", "buyer count", "paying users"],
    supported: true,
    source: "daily_metrics",
    column: "buyers",
  },
  {
    key: "cart_users",
    description: "Distinct users who added to cart per day",
    synonyms: ["cart", "add to cart", "carts", "cart adds"],
    supported: true,
    source: "daily_metrics",
    column: "cart_users",
  },

  // Funnel ratios derived from the aggregates
  {
    key: "uv_to_buyer",
    description: "Share of visitors who bought",
    synonyms: ["conversion", "conversion rate", "cvr", "visitor to buyer"],
    supported: true,
    source: "funnel",
    column: "uv_to_buyer",
  },
  {
    key: "uv_to_cart",
    description: "Share of visitors who added to cart",
    synonyms: ["cart rate", "add to cart rate", "visitor to cart"],
    supported: true,
    source: "funnel",
    column: "uv_to_cart",
  },
  {
    key: "cart_to_buyer",
    description: "Share of cart users who bought",
    synonyms: ["cart conversion", "cart to purchase", "checkout rate"],
    supported: true,
    source: "funnel",
    column: "cart_to_buyer",
  },

  // Raw event derived
  {
    key: "dau",
    description: "Daily active users from the raw event log",
    synonyms: ["daily active users", "active users", "activity"],
    supported: true,
    source: "activity",
    column: "dau",
  },
  {
    key: "retention_1d",
    description: "Share of a day's users active again the next day",
    synonyms: ["retention", "next day retention", "day 1 retention"],
    supported: true,
    source: "retention",
    column: "retention_1d",
  },
  {
    key: "new_vs_old_cvr",
    description: "Conversion of first-day users against returning users",
    synonyms: ["new vs old conversion", "new user conversion", "returning user conversion"],
    supported: true,
    source: "segment",
    column: "new_cvr",
  },

  // Monetary and order metrics have no backing columns
  {
    key: "gmv",
    description: "Gross merchandise value",
    synonyms: ["revenue", "sales", "turnover", "transaction amount"],
    supported: false,
    missing_reason: "The dataset has no price or amount fields",
    missing_fields: ["price", "amount"],
    suggestion: "Ask about buyers, uv or conversion instead",
  },
  {
    key: "aov",
    description: "Average order value",
    synonyms: ["average order value", "basket size", "ticket size"],
    supported: false,
    missing_reason: "The dataset has no price or amount fields",
    missing_fields: ["price", "amount"],
    suggestion: "Ask about buyers or conversion instead",
  },
  {
    key: "arpu",
    description: "Average revenue per user",
    synonyms: ["revenue per user"],
    supported: false,
    missing_reason: "The dataset has no price or amount fields",
    missing_fields: ["price", "amount"],
  },
  {
    key: "roi",
    description: "Return on investment",
    synonyms: ["return on investment", "roas"],
    supported: false,
    missing_reason: "The dataset has no cost or spend fields",
    missing_fields: ["cost", "spend"],
  },
  {
    key: "order_count",
    description: "Number of orders",
    synonyms: ["orders", "order volume"],
    supported: false,
    missing_reason: "The event log records purchase events per user, not orders",
    missing_fields: ["order_id"],
    suggestion: "Ask about buyers instead",
  },
];

export const INTENT_DEFINITIONS: IntentCapability[] = [
  { intent: "overview", description: "Core metrics for a day or window", supported: true },
  { intent: "compare", description: "Metrics across two or more days", supported: true },
  { intent: "attribution", description: "Which factors or categories moved buyers", supported: true },
  { intent: "anomaly", description: "Whether a day deviates from its trailing baseline", supported: true },
  { intent: "diagnose", description: "Why a metric moved between two days", supported: true },
  {
    intent: "forecast",
    description: "Projection of future values",
    supported: false,
    missing_reason: "Only historical days are available; no forecasting model is provided",
    suggestion: "Ask for the recent trend instead",
  },
  {
    intent: "other",
    description: "Questions outside the analytic intents",
    supported: false,
    missing_reason: "The question does not map to a supported analysis",
    suggestion: "Ask about pv, uv, buyers, conversion, retention or categories",
  },
];

export const DIMENSION_DEFINITIONS: DimensionCapability[] = [
  { key: "category", description: "Product category id", synonyms: ["categories", "category_id", "product category"], supported: true },
  { key: "user_segment", description: "New against returning users", synonyms: ["segment", "new vs old"], supported: true },
  {
    key: "region",
    description: "Geographic region",
    synonyms: ["city", "province", "country", "geo"],
    supported: false,
    missing_reason: "Events carry no location",
    missing_fields: ["region"],
  },
  {
    key: "channel",
    description: "Acquisition channel",
    synonyms: ["source", "traffic source", "campaign"],
    supported: false,
    missing_reason: "Events carry no acquisition source",
    missing_fields: ["channel"],
  },
];

export const CORE_METRICS = ["uv", "buyers"] as const;
