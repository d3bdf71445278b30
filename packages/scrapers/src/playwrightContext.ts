import { chromium, firefox, webkit, type Browser, type Page } from "playwright";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { SessionLaunchError, errorMessage } from "@salesharvest/shared";

export type PlaywrightBrowserType = "chromium" | "firefox" | "webkit";

export type PlaywrightContextProfile = {
  browserType?: PlaywrightBrowserType;
  userAgent?: string;
  locale?: string;
  viewport?: { width: number; height: number };
  stealth?: boolean;
  initScripts?: string[];
  headless?: boolean;
  slowMoMs?: number;
};

export type PlaywrightRunArtifactType = "html" | "screenshot" | "other";

export type PlaywrightRunArtifact = {
  key: string;
  type: PlaywrightRunArtifactType;
  absPath: string;
};

export type PlaywrightRunArtifactsOptions = {
  dir: string;
  prefix?: string;
  when?: "always" | "error";
  capture?: {
    html?: boolean;
    screenshot?: boolean;
    trace?: boolean;
  };
  onArtifact?: (artifact: PlaywrightRunArtifact) => void;
};

/** The slice of a Playwright page the session manager drives. */
export type PortalPageDriver = Pick<Page, "goto" | "url" | "content" | "fill" | "click" | "isVisible">;

export type BrowserHandle = {
  newPage(): Promise<PortalPageDriver>;
  clearCookies(): Promise<void>;
  captureArtifacts(phase: "final" | "error"): Promise<void>;
  close(): Promise<void>;
};

export type BrowserLaunchOptions = {
  artifacts?: PlaywrightRunArtifactsOptions;
  warn?: (message: string) => void;
};

export type BrowserLauncher = (profile: PlaywrightContextProfile, options?: BrowserLaunchOptions) => Promise<BrowserHandle>;

const DEFAULT_DESKTOP_UA =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const DEFAULT_VIEWPORT = { width: 1920, height: 1080 } as const;

const DEFAULT_LOCALE = "pt-BR";

function nonBlank(value: string | undefined) {
  const raw = typeof value === "string" ? value.trim() : "";
  return raw || undefined;
}

function languagesForLocale(locale: string | undefined): string[] {
  const loc = nonBlank(locale) ?? DEFAULT_LOCALE;
  const base = loc.split("-", 1)[0] ?? loc;
  const candidates = [loc, base, "en-US", "en"];
  return Array.from(new Set(candidates.map((x) => x.trim()).filter(Boolean)));
}

function buildStealthInitScript(locale: string | undefined): string {
  const languages = languagesForLocale(locale);
  return `
Object.defineProperty(navigator, "webdriver", { get: () => undefined });
Object.defineProperty(navigator, "languages", { get: () => ${JSON.stringify(languages)} });
Object.defineProperty(navigator, "plugins", { get: () => [1, 2, 3, 4, 5] });
`;
}

function pickBrowserType(browserType: PlaywrightBrowserType | undefined) {
  if (browserType === "firefox") return firefox;
  if (browserType === "webkit") return webkit;
  return chromium;
}

export function safePrefix(raw: string | undefined) {
  const cleaned = (raw ?? "").trim().replace(/[^a-zA-Z0-9_-]+/g, "_").replace(/^_+|_+$/g, "");
  return cleaned ? `${cleaned}_` : "";
}

async function capturePageArtifacts(
  page: Page | null,
  artifacts: PlaywrightRunArtifactsOptions | undefined,
  phase: "final" | "error",
  warn: (message: string) => void
) {
  if (!page || !artifacts) return;
  const when = artifacts.when ?? "error";
  const shouldCapture = when === "always" || phase === "error";
  if (!shouldCapture) return;

  const capture = artifacts.capture ?? {};
  const prefix = safePrefix(artifacts.prefix);
  await mkdir(artifacts.dir, { recursive: true });

  if (capture.screenshot !== false) {
    const fileName = `pw_${prefix}${phase}.png`;
    const absPath = path.join(artifacts.dir, fileName);
    try {
      await page.screenshot({ path: absPath, fullPage: true });
      artifacts.onArtifact?.({ key: fileName, type: "screenshot", absPath });
    } catch (err) {
      warn(`screenshot capture failed: ${errorMessage(err)}`);
    }
  }

  if (capture.html !== false) {
    const fileName = `pw_${prefix}${phase}.html`;
    const absPath = path.join(artifacts.dir, fileName);
    try {
      await writeFile(absPath, await page.content());
      artifacts.onArtifact?.({ key: fileName, type: "html", absPath });
    } catch (err) {
      warn(`html capture failed: ${errorMessage(err)}`);
    }
  }
}

/**
 * Launches a browser and a single context for it. The caller owns the returned
 * handle and must `close()` it; closing twice is a no-op.
 */
export const launchPlaywrightContext: BrowserLauncher = async (profile, options) => {
  const browserType = pickBrowserType(profile.browserType);
  const stealth = profile.stealth !== false;
  const userAgent = nonBlank(profile.userAgent) ?? DEFAULT_DESKTOP_UA;
  const locale = nonBlank(profile.locale) ?? DEFAULT_LOCALE;
  const viewport = profile.viewport ?? DEFAULT_VIEWPORT;
  const headless = profile.headless !== false;
  const slowMo = typeof profile.slowMoMs === "number" && Number.isFinite(profile.slowMoMs) && profile.slowMoMs > 0 ? Math.trunc(profile.slowMoMs) : 0;
  const artifacts = options?.artifacts;
  const warn = options?.warn ?? ((message: string) => console.warn(`[playwright] ${message}`));

  const launchArgs: string[] = [];
  if (browserType === chromium) {
    launchArgs.push("--no-sandbox", "--disable-dev-shm-usage");
    if (stealth) launchArgs.push("--disable-blink-features=AutomationControlled");
  }

  let browser: Browser;
  try {
    browser = await browserType.launch({
      headless,
      ...(slowMo > 0 ? { slowMo } : {}),
      ...(launchArgs.length > 0 ? { args: launchArgs } : {})
    });
  } catch (err) {
    throw new SessionLaunchError(
      `Failed to launch ${browserType.name()}: ${errorMessage(err)} (is the browser installed? try \`npx playwright install ${browserType.name()}\`)`,
      { cause: err }
    );
  }
  const launched = browser;

  try {
    const context = await launched.newContext({ userAgent, locale, viewport });

    let lastPage: Page | null = null;
    context.on("page", (p) => {
      lastPage = p;
    });

    const captureTrace = artifacts?.capture?.trace === true;
    if (captureTrace) {
      await context.tracing.start({ screenshots: true, snapshots: true, sources: true });
    }

    if (stealth) {
      await context.addInitScript(buildStealthInitScript(locale));
    }
    for (const script of profile.initScripts ?? []) {
      if (typeof script === "string" && script.trim()) {
        await context.addInitScript(script);
      }
    }

    let closed = false;
    return {
      newPage: async () => await context.newPage(),
      clearCookies: async () => {
        await context.clearCookies();
      },
      captureArtifacts: async (phase) => {
        await capturePageArtifacts(lastPage, artifacts, phase, warn);
      },
      close: async () => {
        if (closed) return;
        closed = true;
        if (captureTrace && artifacts) {
          const fileName = `pw_${safePrefix(artifacts.prefix)}trace.zip`;
          const absPath = path.join(artifacts.dir, fileName);
          try {
            await mkdir(artifacts.dir, { recursive: true });
            await context.tracing.stop({ path: absPath });
            artifacts.onArtifact?.({ key: fileName, type: "other", absPath });
          } catch (err) {
            warn(`trace capture failed: ${errorMessage(err)}`);
          }
        }
        await context.close().catch((err: unknown) => warn(`context close failed: ${errorMessage(err)}`));
        await launched.close().catch((err: unknown) => warn(`browser close failed: ${errorMessage(err)}`));
      }
    };
  } catch (err) {
    await launched.close().catch((closeErr: unknown) => warn(`browser close failed: ${errorMessage(closeErr)}`));
    throw new SessionLaunchError(`Failed to open a browser context: ${errorMessage(err)}`, { cause: err });
  }
};
