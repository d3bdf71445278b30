import { randomUUID } from "node:crypto";
import {
  AuthenticationError,
  NavigationTimeoutError,
  SessionExpiredError,
  WaitTimeoutError,
  asNonEmptyString,
  errorMessage,
  waitUntil,
  type Credentials,
  type SessionState,
  type Sleep
} from "@salesharvest/shared";
import {
  launchPlaywrightContext,
  type BrowserHandle,
  type BrowserLaunchOptions,
  type BrowserLauncher,
  type PortalPageDriver
} from "./playwrightContext.js";
import type { PortalProfile } from "./portalProfile.js";
import { listingSignature } from "./salesListing.js";

export type PortalTarget = { kind: "listing" } | { kind: "nextPage"; previousSignature: string };

export type PortalPage = {
  url: string;
  content(): Promise<string>;
};

export type PortalSession = {
  readonly id: string;
  state: SessionState;
  readonly handle: BrowserHandle;
  readonly page: PortalPageDriver;
};

export type SessionManager<S> = {
  authenticate(credentials: Credentials): Promise<S>;
  /** Logs in again inside the same browser context after the portal dropped the session. */
  reauthenticate(session: S, credentials: Credentials): Promise<void>;
  navigate(session: S, target: PortalTarget): Promise<PortalPage>;
  close(session: S, outcome?: "final" | "error"): Promise<void>;
};

export type ListingNavigator<S> = Pick<SessionManager<S>, "navigate">;

export type PortalSessionManagerOptions = {
  profile: PortalProfile;
  launcher?: BrowserLauncher;
  launchOptions?: BrowserLaunchOptions;
  loginTimeoutMs?: number;
  navigationTimeoutMs?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
  log?: (message: string) => void | Promise<void>;
  wait?: { now?: () => number; sleep?: Sleep };
};

type LoginOutcome = "ok" | "captcha" | "rejected";
type NavigationOutcome = "ready" | "expired";

export function createPortalSessionManager(options: PortalSessionManagerOptions): SessionManager<PortalSession> {
  const profile = options.profile;
  const sel = profile.selectors;
  const launcher = options.launcher ?? launchPlaywrightContext;
  const loginTimeoutMs = options.loginTimeoutMs ?? 20_000;
  const navigationTimeoutMs = options.navigationTimeoutMs ?? 15_000;
  const log = options.log ?? ((message: string) => console.log(`[portal] ${message}`));
  const loginPath = new URL(profile.loginUrl).pathname;

  async function waitFor<T>(description: string, timeoutMs: number, probe: () => Promise<T | undefined>) {
    return await waitUntil(probe, {
      timeoutMs,
      description,
      ...(options.pollIntervalMs !== undefined ? { intervalMs: options.pollIntervalMs } : {}),
      ...(options.signal ? { signal: options.signal } : {}),
      ...(options.wait?.now ? { now: options.wait.now } : {}),
      ...(options.wait?.sleep ? { sleep: options.wait.sleep } : {})
    });
  }

  async function visible(page: PortalPageDriver, selector: string | undefined) {
    return selector ? await page.isVisible(selector) : false;
  }

  async function onLoginPage(page: PortalPageDriver) {
    if (new URL(page.url()).pathname === loginPath) return true;
    return await visible(page, sel.username);
  }

  async function goto(page: PortalPageDriver, url: string, what: string) {
    try {
      await page.goto(url, { waitUntil: "domcontentloaded", timeout: navigationTimeoutMs });
    } catch (err) {
      throw new NavigationTimeoutError(`Failed to open ${what}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async function login(session: PortalSession, credentials: Credentials) {
    const page = session.page;
    await goto(page, profile.loginUrl, "login page");

    try {
      await waitFor("login form", navigationTimeoutMs, async () => ((await visible(page, sel.username)) ? true : undefined));
    } catch (err) {
      if (err instanceof WaitTimeoutError) {
        throw new NavigationTimeoutError(`Login form ${sel.username} never appeared`, { cause: err });
      }
      throw err;
    }

    await page.fill(sel.username, credentials.username);
    await page.fill(sel.password, credentials.password);
    await page.click(sel.submit);

    let outcome: LoginOutcome;
    try {
      outcome = await waitFor<LoginOutcome>("post-login page", loginTimeoutMs, async () => {
        if (profile.loggedInUrlContains && page.url().includes(profile.loggedInUrlContains)) return "ok";
        if (await visible(page, sel.loggedInMarker)) return "ok";
        if (await visible(page, sel.loginError)) return "rejected";
        if (await visible(page, sel.captcha)) return "captcha";
        return undefined;
      });
    } catch (err) {
      if (err instanceof WaitTimeoutError) {
        throw new AuthenticationError(`Login did not complete within ${loginTimeoutMs}ms`, { cause: err });
      }
      throw err;
    }

    if (outcome === "rejected") {
      throw new AuthenticationError("Portal rejected the credentials", { retryable: false });
    }
    if (outcome === "captcha") {
      throw new AuthenticationError("Portal presented a CAPTCHA challenge");
    }
  }

  function assertUsable(session: PortalSession) {
    if (session.state === "expired") {
      throw new SessionExpiredError(`Session ${session.id} has expired`);
    }
    if (session.state !== "authenticated") {
      throw new AuthenticationError(`Session ${session.id} is ${session.state}`, { retryable: false });
    }
  }

  async function waitForListing(session: PortalSession, previousSignature: string | undefined) {
    const page = session.page;
    const readySelector = sel.listingReady ?? sel.listingTable;
    let outcome: NavigationOutcome;
    try {
      outcome = await waitFor<NavigationOutcome>("listing page", navigationTimeoutMs, async () => {
        if (await onLoginPage(page)) return "expired";
        if (!(await visible(page, readySelector))) return undefined;
        if (previousSignature === undefined) return "ready";
        return listingSignature(await page.content(), profile) !== previousSignature ? "ready" : undefined;
      });
    } catch (err) {
      if (err instanceof WaitTimeoutError) {
        throw new NavigationTimeoutError(`Listing not ready after ${navigationTimeoutMs}ms (${page.url()})`, {
          cause: err
        });
      }
      throw err;
    }

    if (outcome === "expired") {
      session.state = "expired";
      throw new SessionExpiredError(`Portal redirected to the login page (${page.url()})`);
    }
  }

  return {
    async authenticate(credentials) {
      if (!asNonEmptyString(credentials.username) || !asNonEmptyString(credentials.password)) {
        throw new AuthenticationError("Portal username and password are required", { retryable: false });
      }

      const handle = await launcher(profile.browser ?? {}, options.launchOptions);
      try {
        const session: PortalSession = { id: randomUUID(), state: "unauthenticated", handle, page: await handle.newPage() };
        await login(session, credentials);
        session.state = "authenticated";
        await log(`Session ${session.id} authenticated`);
        return session;
      } catch (err) {
        await handle
          .captureArtifacts("error")
          .catch(async (captureErr: unknown) => await log(`artifact capture failed: ${errorMessage(captureErr)}`));
        await handle.close();
        throw err;
      }
    },

    async reauthenticate(session, credentials) {
      if (session.state === "closed") {
        throw new AuthenticationError(`Session ${session.id} is closed`, { retryable: false });
      }
      session.state = "expired";
      await session.handle.clearCookies();
      await login(session, credentials);
      session.state = "authenticated";
      await log(`Session ${session.id} re-authenticated`);
    },

    async navigate(session, target) {
      assertUsable(session);
      const page = session.page;

      if (target.kind === "listing") {
        await goto(page, profile.listingUrl, "listing");
        await waitForListing(session, undefined);
      } else {
        if (await onLoginPage(page)) {
          session.state = "expired";
          throw new SessionExpiredError(`Portal redirected to the login page (${page.url()})`);
        }
        // A retried step may find the click from the failed attempt already applied.
        if (listingSignature(await page.content(), profile) === target.previousSignature) {
          try {
            await page.click(sel.nextPage, { timeout: navigationTimeoutMs });
          } catch (err) {
            throw new NavigationTimeoutError(`Next-page control could not be clicked: ${errorMessage(err)}`, {
              cause: err
            });
          }
        }
        await waitForListing(session, target.previousSignature);
      }

      return {
        url: page.url(),
        content: async () => await page.content()
      };
    },

    async close(session, outcome = "final") {
      if (session.state === "closed") return;
      session.state = "closed";
      try {
        await session.handle.captureArtifacts(outcome);
      } finally {
        await session.handle.close();
        await log(`Session ${session.id} closed`);
      }
    }
  };
}
