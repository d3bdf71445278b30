import { normalizeSpaces, type RawRecord, type Rejection, type SalesField, type SalesRecord } from "@salesharvest/shared";

export type DateFormat = "DD/MM/YYYY" | "MM/DD/YYYY" | "YYYY-MM-DD";

export type NormalizeLocale = {
  decimalSeparator: "," | ".";
  thousandsSeparator: "." | "," | " " | "";
  dateFormat: DateFormat;
};

export const PT_BR_LOCALE: NormalizeLocale = {
  decimalSeparator: ",",
  thousandsSeparator: ".",
  dateFormat: "DD/MM/YYYY"
};

export type NormalizeResult = { ok: true; record: SalesRecord } | { ok: false; rejection: Rejection };

// Column limits of sales_records: INTEGER quantity, NUMERIC(14, 2) amount.
const MAX_QUANTITY = 2_147_483_647;
const AMOUNT_CENTS_LIMIT = 100_000_000_000_000;

type ParsedNumber = { negative: boolean; integer: string; fraction: string };

class FieldError extends Error {
  readonly field: SalesField;

  constructor(field: SalesField, detail: string) {
    super(detail);
    this.field = field;
  }
}

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const numberPatterns = new Map<string, RegExp>();

function numberPattern(locale: NormalizeLocale) {
  const key = `${locale.decimalSeparator}|${locale.thousandsSeparator}`;
  const cached = numberPatterns.get(key);
  if (cached) return cached;
  const ds = escapeRegExp(locale.decimalSeparator);
  const ts = escapeRegExp(locale.thousandsSeparator);
  const integer = locale.thousandsSeparator ? `\\d{1,3}(?:${ts}\\d{3})+|\\d+` : `\\d+`;
  // Currency prefix and unit suffix may be any text without digits.
  const pattern = new RegExp(`^[^\\d-]*?(-)?\\s*(${integer})(?:${ds}(\\d+))?(?!\\d)[^\\d]*$`);
  numberPatterns.set(key, pattern);
  return pattern;
}

function parseLocaleNumber(field: SalesField, raw: string, locale: NormalizeLocale): ParsedNumber {
  const value = normalizeSpaces(raw);
  if (!value) throw new FieldError(field, `${field} is empty`);
  const match = numberPattern(locale).exec(value);
  if (!match) throw new FieldError(field, `${field} "${value}" is not a number`);
  const grouped = match[2] ?? "";
  const integer = locale.thousandsSeparator ? grouped.split(locale.thousandsSeparator).join("") : grouped;
  return { negative: match[1] === "-", integer, fraction: match[3] ?? "" };
}

function parseQuantity(raw: string, locale: NormalizeLocale) {
  const parsed = parseLocaleNumber("quantity", raw, locale);
  if (/[^0]/.test(parsed.fraction)) {
    throw new FieldError("quantity", `quantity "${normalizeSpaces(raw)}" is not a whole number`);
  }
  const quantity = Number(parsed.integer);
  if (!Number.isSafeInteger(quantity) || quantity > MAX_QUANTITY) {
    throw new FieldError("quantity", `quantity "${normalizeSpaces(raw)}" is out of range`);
  }
  if (parsed.negative && quantity !== 0) {
    throw new FieldError("quantity", `quantity "${normalizeSpaces(raw)}" is negative`);
  }
  return quantity;
}

function parseAmount(raw: string, locale: NormalizeLocale) {
  const parsed = parseLocaleNumber("amount", raw, locale);
  const fraction = parsed.fraction.replace(/0+$/, "");
  if (fraction.length > 2) {
    throw new FieldError("amount", `amount "${normalizeSpaces(raw)}" has more than two decimals`);
  }
  const cents = Number(parsed.integer) * 100 + Number(fraction.padEnd(2, "0"));
  if (!Number.isSafeInteger(cents) || cents >= AMOUNT_CENTS_LIMIT) {
    throw new FieldError("amount", `amount "${normalizeSpaces(raw)}" is out of range`);
  }
  const amount = cents / 100;
  return parsed.negative && cents !== 0 ? -amount : amount;
}

function isLeapYear(year: number) {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number) {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

const datePatterns: Record<DateFormat, { pattern: RegExp; order: ["y" | "m" | "d", "y" | "m" | "d", "y" | "m" | "d"] }> = {
  "DD/MM/YYYY": { pattern: /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/, order: ["d", "m", "y"] },
  "MM/DD/YYYY": { pattern: /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/, order: ["m", "d", "y"] },
  "YYYY-MM-DD": { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: ["y", "m", "d"] }
};

function parseDate(raw: string, locale: NormalizeLocale) {
  const value = normalizeSpaces(raw);
  if (!value) throw new FieldError("date", "date is empty");
  // A trailing time ("03/02/2024 14:05" or ISO "…T14:05") is ignored.
  const datePart = value.split(/[\sT]/, 1)[0] ?? "";
  const { pattern, order } = datePatterns[locale.dateFormat];
  const match = pattern.exec(datePart);
  if (!match) throw new FieldError("date", `date "${value}" does not match ${locale.dateFormat}`);

  const parts = { y: 0, m: 0, d: 0 };
  order.forEach((key, idx) => {
    parts[key] = Number(match[idx + 1]);
  });
  if (parts.y < 1 || parts.m < 1 || parts.m > 12 || parts.d < 1 || parts.d > daysInMonth(parts.y, parts.m)) {
    throw new FieldError("date", `date "${value}" is not a calendar date`);
  }
  return `${String(parts.y).padStart(4, "0")}-${String(parts.m).padStart(2, "0")}-${String(parts.d).padStart(2, "0")}`;
}

function parseText(field: "customer" | "product", raw: string | undefined) {
  const value = normalizeSpaces(raw ?? "");
  if (!value) throw new FieldError(field, `${field} is empty`);
  return value;
}

function requireCell(field: SalesField, raw: RawRecord) {
  const value = raw[field];
  if (value === undefined) throw new FieldError(field, `${field} column is missing`);
  return value;
}

/**
 * Turns one listing row into a SalesRecord. Pure: no clock, no I/O, and bad
 * input comes back as a Rejection rather than an exception.
 */
export function normalizeSalesRow(raw: RawRecord, locale: NormalizeLocale = PT_BR_LOCALE): NormalizeResult {
  const externalId = normalizeSpaces(raw.external_id ?? "");
  if (!externalId) {
    return { ok: false, rejection: { reason: "MissingKey", field: "external_id", detail: "external_id is empty" } };
  }

  try {
    const record: SalesRecord = {
      externalId,
      date: parseDate(requireCell("date", raw), locale),
      customer: parseText("customer", raw.customer),
      product: parseText("product", raw.product),
      quantity: parseQuantity(requireCell("quantity", raw), locale),
      amount: parseAmount(requireCell("amount", raw), locale)
    };
    return { ok: true, record };
  } catch (err) {
    if (err instanceof FieldError) {
      return { ok: false, rejection: { reason: "FieldParseError", field: err.field, detail: err.message } };
    }
    throw err;
  }
}
