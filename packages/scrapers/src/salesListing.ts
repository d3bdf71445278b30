import { load, type CheerioAPI } from "cheerio";
import {
  ExtractionAbortedError,
  SALES_FIELDS,
  normalizeSpaces,
  throwIfAborted,
  type ExtractedPage,
  type RawRecord
} from "@salesharvest/shared";
import type { PortalProfile } from "./portalProfile.js";
import type { ListingNavigator } from "./portalSession.js";

type ListingProfile = Pick<PortalProfile, "selectors" | "columns">;

export type ParsedListingRow = { fields: RawRecord } | { mismatch: string };

export type ParsedListing = {
  rows: ParsedListingRow[];
  hasNextPage: boolean;
  signature: string;
};

/** Header comparison ignores case, accents and repeated whitespace. */
export function normalizeHeader(value: string) {
  return normalizeSpaces(value.normalize("NFD").replace(/[\u0300-\u036f]/g, "")).toLowerCase();
}

function hasNextPage($: CheerioAPI, profile: ListingProfile) {
  const next = $(profile.selectors.nextPage).first();
  if (next.length === 0) return false;
  if (next.is("[disabled], [aria-disabled='true'], .disabled")) return false;
  return next.closest(".disabled").length === 0;
}

function signatureOf($: CheerioAPI, profile: ListingProfile) {
  const indicator = profile.selectors.pageIndicator;
  if (indicator) {
    const text = normalizeSpaces($(indicator).first().text());
    if (text) return `indicator:${text}`;
  }
  const table = $(profile.selectors.listingTable).first();
  if (table.length === 0) return "";
  const rows = table.find("tbody tr");
  return `rows:${rows.length}:${normalizeSpaces(rows.first().text())}`;
}

/**
 * Fingerprint of the listing page currently rendered, used to tell that a
 * next-page click has actually replaced the rows.
 */
export function listingSignature(html: string, profile: ListingProfile) {
  return signatureOf(load(html), profile);
}

export function parseSalesListingHtml(html: string, profile: ListingProfile): ParsedListing {
  const $ = load(html);
  const table = $(profile.selectors.listingTable).first();
  if (table.length === 0) {
    throw new ExtractionAbortedError(`Listing table ${profile.selectors.listingTable} not found on page`);
  }

  const headerRow = table.find("thead tr").first();
  const headerEl = headerRow.length > 0 ? headerRow.get(0) : table.find("tr").has("th").first().get(0);
  if (!headerEl) {
    throw new ExtractionAbortedError("Listing table has no header row");
  }
  const headers = $(headerEl)
    .children("th, td")
    .toArray()
    .map((cell) => normalizeHeader($(cell).text()));

  const columnIndex = new Map<string, number>();
  const missing: string[] = [];
  for (const field of SALES_FIELDS) {
    const idx = headers.indexOf(normalizeHeader(profile.columns[field]));
    if (idx === -1) missing.push(profile.columns[field]);
    else columnIndex.set(field, idx);
  }
  if (missing.length > 0) {
    throw new ExtractionAbortedError(
      `Listing columns changed: missing ${missing.map((m) => `"${m}"`).join(", ")} (found ${headers.map((h) => `"${h}"`).join(", ")})`
    );
  }

  const emptyMarker = profile.selectors.emptyListing;
  const isEmpty = emptyMarker ? $(emptyMarker).length > 0 : false;

  const rows: ParsedListingRow[] = [];
  if (!isEmpty) {
    const bodyRows = table
      .find("tr")
      .toArray()
      .filter((tr) => tr !== headerEl && $(tr).closest("thead, tfoot").length === 0 && $(tr).children("td").length > 0);

    for (const tr of bodyRows) {
      const cells = $(tr)
        .children("td, th")
        .toArray()
        .map((cell) => normalizeSpaces($(cell).text()));
      if (cells.length !== headers.length) {
        rows.push({ mismatch: `expected ${headers.length} cells, found ${cells.length}` });
        continue;
      }
      const fields: RawRecord = {};
      for (const [field, idx] of columnIndex) {
        fields[field] = cells[idx] ?? "";
      }
      rows.push({ fields });
    }
  }

  return {
    rows,
    hasNextPage: hasNextPage($, profile),
    signature: signatureOf($, profile)
  };
}

export type ExtractOptions = {
  /** Pages before this one are walked but not yielded. */
  startPage?: number;
  maxPages?: number;
  signal?: AbortSignal;
  retry?: <T>(label: string, fn: () => Promise<T>) => Promise<T>;
  log?: (message: string) => void | Promise<void>;
};

const passThrough = async <T>(_label: string, fn: () => Promise<T>) => await fn();

/**
 * Walks the paginated listing one page at a time. The generator is finite and
 * single-use: resuming needs a fresh call, which navigates from the first page.
 */
export async function* extractSalesPages<S>(
  navigator: ListingNavigator<S>,
  session: S,
  profile: ListingProfile,
  options: ExtractOptions = {}
): AsyncGenerator<ExtractedPage, void, undefined> {
  const startPage = Math.max(1, Math.trunc(options.startPage ?? 1));
  const maxPages = Math.max(1, Math.trunc(options.maxPages ?? 500));
  const retry = options.retry ?? passThrough;

  let page = await retry("open listing", () => navigator.navigate(session, { kind: "listing" }));

  for (let pageNumber = 1; ; pageNumber += 1) {
    throwIfAborted(options.signal, `listing page ${pageNumber}`);
    const listing = parseSalesListingHtml(await page.content(), profile);

    // A lone malformed row is a per-row rejection; several with none usable means the layout changed.
    if (listing.rows.length > 1 && listing.rows.every((row) => "mismatch" in row)) {
      throw new ExtractionAbortedError(
        `Listing page ${pageNumber}: none of ${listing.rows.length} rows match the expected columns`
      );
    }

    if (pageNumber >= startPage) {
      await options.log?.(`Listing page ${pageNumber}: ${listing.rows.length} row(s)`);
      yield {
        pageNumber,
        url: page.url,
        rows: listing.rows.map((row, idx) => ({ ref: { page: pageNumber, row: idx + 1 }, ...row }))
      };
    } else {
      await options.log?.(`Skipping listing page ${pageNumber} (resuming at ${startPage})`);
    }

    if (!listing.hasNextPage) {
      await options.log?.(`Pagination exhausted after page ${pageNumber}`);
      return;
    }
    if (pageNumber >= maxPages) {
      await options.log?.(`Stopping at page ${pageNumber}: maxPages=${maxPages} reached`);
      return;
    }

    const previousSignature = listing.signature;
    page = await retry(`open listing page ${pageNumber + 1}`, () =>
      navigator.navigate(session, { kind: "nextPage", previousSignature })
    );
  }
}
