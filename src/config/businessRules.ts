/**
 * Business rule constants shared by the search and document pipelines.
 *
 * Keeps the policy knobs (bounds, allow-lists, field lists) in one place so the
 * rule engine itself stays a set of pure functions.
 */
export const DEFAULT_PAGE_SIZE = 10;
export const DEFAULT_SUGGEST_SIZE = 5;
export const MAX_RESULT_SIZE = 1000;
export const MAX_OFFSET = 10000;

export const SORTABLE_FIELDS: ReadonlySet<string> = new Set([
  "_score",
  "_id",
  "created_at",
  "updated_at",
  "name",
  "title",
  "date",
  "price",
  "rating",
]);

export const SENSITIVE_FIELDS = [
  "password",
  "password_hash",
  "secret",
  "token",
  "api_key",
  "private_key",
  "ssn",
  "credit_card",
] as const;

export const MATCH_QUALITY_THRESHOLDS = {
  high: 0.8,
  medium: 0.5,
} as const;

/** Fields a document must carry, keyed by collection. */
export const REQUIRED_FIELDS: Readonly<Record<string, readonly string[]>> = {
  users: ["email", "name"],
  products: ["name", "price"],
};
