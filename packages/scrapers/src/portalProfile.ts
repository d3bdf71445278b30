import { ConfigError, asNonEmptyString, isPlainObject, type SalesField } from "@salesharvest/shared";
import type { PlaywrightContextProfile } from "./playwrightContext.js";

/** CSS selectors only: they are evaluated both by Playwright and by cheerio. */
export type PortalSelectors = {
  username: string;
  password: string;
  submit: string;
  loggedInMarker?: string;
  loginError?: string;
  captcha?: string;
  listingTable: string;
  listingReady?: string;
  emptyListing?: string;
  nextPage: string;
  pageIndicator?: string;
};

export type PortalProfile = {
  loginUrl: string;
  listingUrl: string;
  /** Substring of the URL the portal lands on after a successful login. */
  loggedInUrlContains?: string;
  selectors: PortalSelectors;
  /** Column header text for every sales field, as printed on the listing. */
  columns: Record<SalesField, string>;
  browser?: PlaywrightContextProfile;
};

function requireString(cfg: Record<string, unknown>, key: string, where: string): string {
  const value = asNonEmptyString(cfg[key]);
  if (!value) throw new ConfigError(`Invalid portal profile: ${where}${key} is required`);
  return value;
}

function requireUrl(cfg: Record<string, unknown>, key: string): string {
  const raw = requireString(cfg, key, "");
  try {
    return new URL(raw).toString();
  } catch {
    throw new ConfigError(`Invalid portal profile: ${key} is not an absolute URL (${raw})`);
  }
}

export function parsePlaywrightProfile(cfg: Record<string, unknown>): PlaywrightContextProfile | undefined {
  const pickString = (key: string) => asNonEmptyString(cfg[key]);
  const pickBool = (key: string) => {
    const v = cfg[key];
    return typeof v === "boolean" ? v : undefined;
  };

  const browserTypeRaw = pickString("browserType") ?? pickString("browser_type");
  const browserType =
    browserTypeRaw === "chromium" || browserTypeRaw === "firefox" || browserTypeRaw === "webkit"
      ? browserTypeRaw
      : undefined;

  const userAgent = pickString("userAgent") ?? pickString("user_agent");
  const locale = pickString("locale");
  const stealth = pickBool("stealth");
  const headless = pickBool("headless");

  const viewportRaw = cfg.viewport;
  const viewport =
    isPlainObject(viewportRaw) &&
    typeof viewportRaw.width === "number" &&
    Number.isFinite(viewportRaw.width) &&
    typeof viewportRaw.height === "number" &&
    Number.isFinite(viewportRaw.height)
      ? { width: Math.trunc(viewportRaw.width), height: Math.trunc(viewportRaw.height) }
      : undefined;

  const initScriptsRaw = cfg.initScripts;
  const initScripts =
    typeof initScriptsRaw === "string"
      ? [initScriptsRaw]
      : Array.isArray(initScriptsRaw)
        ? initScriptsRaw.filter((s): s is string => typeof s === "string" && s.trim().length > 0)
        : undefined;

  const slowMoRaw = cfg.slowMoMs ?? cfg.slow_mo_ms;
  const slowMoMs =
    typeof slowMoRaw === "number" && Number.isFinite(slowMoRaw) && slowMoRaw > 0 ? Math.trunc(slowMoRaw) : undefined;

  const profile: PlaywrightContextProfile = {
    ...(browserType ? { browserType } : {}),
    ...(userAgent ? { userAgent } : {}),
    ...(locale ? { locale } : {}),
    ...(viewport ? { viewport } : {}),
    ...(stealth !== undefined ? { stealth } : {}),
    ...(initScripts ? { initScripts } : {}),
    ...(headless !== undefined ? { headless } : {}),
    ...(slowMoMs !== undefined ? { slowMoMs } : {})
  };

  return Object.keys(profile).length > 0 ? profile : undefined;
}

export function parsePortalProfile(config: unknown): PortalProfile {
  if (!isPlainObject(config)) throw new ConfigError("Invalid portal profile: expected a JSON object");

  const loginUrl = requireUrl(config, "loginUrl");
  const listingUrl = requireUrl(config, "listingUrl");
  const loggedInUrlContains = asNonEmptyString(config.loggedInUrlContains);

  if (!isPlainObject(config.selectors)) throw new ConfigError("Invalid portal profile: selectors must be an object");
  const sel = config.selectors;
  const optional = (key: string) => asNonEmptyString(sel[key]);
  const selectors: PortalSelectors = {
    username: requireString(sel, "username", "selectors."),
    password: requireString(sel, "password", "selectors."),
    submit: requireString(sel, "submit", "selectors."),
    listingTable: requireString(sel, "listingTable", "selectors."),
    nextPage: requireString(sel, "nextPage", "selectors."),
    ...(optional("loggedInMarker") ? { loggedInMarker: optional("loggedInMarker") } : {}),
    ...(optional("loginError") ? { loginError: optional("loginError") } : {}),
    ...(optional("captcha") ? { captcha: optional("captcha") } : {}),
    ...(optional("listingReady") ? { listingReady: optional("listingReady") } : {}),
    ...(optional("emptyListing") ? { emptyListing: optional("emptyListing") } : {}),
    ...(optional("pageIndicator") ? { pageIndicator: optional("pageIndicator") } : {})
  };

  if (!loggedInUrlContains && !selectors.loggedInMarker) {
    throw new ConfigError("Invalid portal profile: set loggedInUrlContains or selectors.loggedInMarker");
  }

  if (!isPlainObject(config.columns)) throw new ConfigError("Invalid portal profile: columns must be an object");
  const cols = config.columns;
  const columns: Record<SalesField, string> = {
    external_id: requireString(cols, "external_id", "columns."),
    date: requireString(cols, "date", "columns."),
    customer: requireString(cols, "customer", "columns."),
    product: requireString(cols, "product", "columns."),
    quantity: requireString(cols, "quantity", "columns."),
    amount: requireString(cols, "amount", "columns.")
  };

  const browser = isPlainObject(config.browser) ? parsePlaywrightProfile(config.browser) : undefined;

  return {
    loginUrl,
    listingUrl,
    ...(loggedInUrlContains ? { loggedInUrlContains } : {}),
    selectors,
    columns,
    ...(browser ? { browser } : {})
  };
}
