export * from "./errors.js";
export * from "./wait.js";

export type RunStatus = "completed" | "failed" | "canceled";

export type RunStage = "init" | "authenticating" | "extracting" | "persisting" | "done" | "failed" | "canceled";

export type Credentials = {
  username: string;
  password: string;
};

export type SessionState = "unauthenticated" | "authenticated" | "expired" | "closed";

/** Cell text keyed by field name, exactly as rendered on the listing page. */
export type RawRecord = Record<string, string>;

export type RecordRef = {
  page: number;
  row: number;
};

export type ExtractedRow =
  | { ref: RecordRef; fields: RawRecord }
  | { ref: RecordRef; mismatch: string };

export type ExtractedPage = {
  pageNumber: number;
  url: string;
  rows: ExtractedRow[];
};

export type SalesRecord = {
  externalId: string;
  /** Calendar date, `YYYY-MM-DD`. */
  date: string;
  customer: string;
  product: string;
  quantity: number;
  amount: number;
};

export type RejectionReason = "SchemaMismatch" | "FieldParseError" | "MissingKey";

export type Rejection = {
  reason: RejectionReason;
  field?: string;
  detail: string;
};

export type SalesField = "external_id" | "date" | "customer" | "product" | "quantity" | "amount";

export const SALES_FIELDS: readonly SalesField[] = [
  "external_id",
  "date",
  "customer",
  "product",
  "quantity",
  "amount"
];

export type RunError = {
  recordRef: string | null;
  reason: string;
  message: string;
};

export type RunSummary = {
  readonly runId: string;
  readonly status: RunStatus;
  readonly recordsSeen: number;
  readonly recordsUpserted: number;
  readonly recordsRejected: number;
  readonly recordsFailed: number;
  readonly inserted: number;
  readonly updated: number;
  readonly batches: number;
  readonly reauthentications: number;
  readonly errors: ReadonlyArray<Readonly<RunError>>;
  readonly startedAt: string;
  readonly finishedAt: string;
};

export function formatRecordRef(ref: RecordRef) {
  return `page:${ref.page}/row:${ref.row}`;
}

export function asNonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function normalizeSpaces(value: string) {
  return value.replace(/\s+/g, " ").trim();
}
