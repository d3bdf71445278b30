import { load } from "cheerio";
import { SessionLaunchError, type Credentials } from "@salesharvest/shared";
import type { BrowserHandle, BrowserLauncher, PortalPageDriver } from "../playwrightContext.js";
import type { PortalProfile } from "../portalProfile.js";

export const FAKE_PORTAL_ORIGIN = "https://portal.test";

export const FAKE_PORTAL_HEADERS = ["Pedido", "Data", "Cliente", "Produto", "Quantidade", "Valor"];

export const fakePortalProfile: PortalProfile = {
  loginUrl: `${FAKE_PORTAL_ORIGIN}/login`,
  listingUrl: `${FAKE_PORTAL_ORIGIN}/vendas`,
  loggedInUrlContains: "/indicadores/",
  selectors: {
    username: "#id_usuario",
    password: "#id_senha",
    submit: "#botaoEfetuarLogin",
    loginError: ".login-error",
    captcha: ".captcha",
    listingTable: "#listagem_vendas",
    emptyListing: ".sem-registros",
    nextPage: "a.proxima",
    pageIndicator: ".pagina-atual"
  },
  columns: {
    external_id: "Pedido",
    date: "Data",
    customer: "Cliente",
    product: "Produto",
    quantity: "Quantidade",
    amount: "Valor"
  }
};

export type FakeLoginResponse = "ok" | "captcha" | "rejected" | "hang";

export type FakePortalOptions = {
  credentials: Credentials;
  /** Cell texts per row, per listing page. */
  pages: string[][][];
  headers?: string[];
  /** Scripted answers for successive login attempts; afterwards credentials decide. */
  loginResponses?: FakeLoginResponse[];
  /** The session is dropped the first time each of these pages is requested. */
  expireBeforePages?: number[];
  /** Number of next-page clicks that fail before clicks start working. */
  failingNextClicks?: number;
  /** Number of listing loads that fail before loads start working. */
  failingListingLoads?: number;
};

type View =
  | { kind: "blank" }
  | { kind: "login"; message?: "error" | "captcha" }
  | { kind: "home" }
  | { kind: "listing"; page: number };

function esc(value: string) {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * In-process stand-in for the sales portal: renders a login form and a paginated
 * listing, and implements the slice of a Playwright page the session manager uses.
 */
export class FakePortal {
  readonly options: FakePortalOptions;
  authenticated = false;
  loginAttempts = 0;
  cookieClears = 0;
  private view: View = { kind: "blank" };
  private readonly inputs = new Map<string, string>();
  private readonly expiredPages = new Set<number>();
  private failingNextClicks: number;
  private failingListingLoads: number;

  constructor(options: FakePortalOptions) {
    this.options = options;
    this.failingNextClicks = options.failingNextClicks ?? 0;
    this.failingListingLoads = options.failingListingLoads ?? 0;
  }

  get totalPages() {
    return Math.max(1, this.options.pages.length);
  }

  clearCookies() {
    this.cookieClears += 1;
    this.authenticated = false;
  }

  private showPage(page: number) {
    const shouldExpire = (this.options.expireBeforePages ?? []).includes(page) && !this.expiredPages.has(page);
    if (shouldExpire) {
      this.expiredPages.add(page);
      this.authenticated = false;
    }
    this.view = this.authenticated ? { kind: "listing", page } : { kind: "login" };
  }

  path() {
    switch (this.view.kind) {
      case "blank":
        return "/";
      case "login":
        return "/login";
      case "home":
        return "/indicadores/";
      case "listing":
        return this.view.page === 1 ? "/vendas" : `/vendas?pagina=${this.view.page}`;
    }
  }

  goto(url: string) {
    const target = new URL(url);
    if (target.pathname === "/login") {
      this.view = { kind: "login" };
    } else if (target.pathname === "/vendas") {
      if (this.failingListingLoads > 0) {
        this.failingListingLoads -= 1;
        throw new Error(`net::ERR_CONNECTION_RESET at ${url}`);
      }
      this.showPage(1);
    } else {
      this.view = { kind: "blank" };
    }
  }

  fill(selector: string, value: string) {
    if (this.view.kind !== "login") throw new Error(`No element matches ${selector}`);
    this.inputs.set(selector, value);
  }

  click(selector: string) {
    if (this.view.kind === "login" && selector === fakePortalProfile.selectors.submit) {
      this.submitLogin();
      return;
    }
    if (this.view.kind === "listing" && selector === fakePortalProfile.selectors.nextPage) {
      if (this.failingNextClicks > 0) {
        this.failingNextClicks -= 1;
        throw new Error(`Timeout exceeded while clicking ${selector}`);
      }
      if (this.view.page >= this.totalPages) throw new Error(`${selector} is disabled`);
      this.showPage(this.view.page + 1);
      return;
    }
    throw new Error(`No element matches ${selector}`);
  }

  private submitLogin() {
    const attempt = this.loginAttempts;
    this.loginAttempts += 1;
    const { username, password } = this.options.credentials;
    const matches =
      this.inputs.get(fakePortalProfile.selectors.username) === username &&
      this.inputs.get(fakePortalProfile.selectors.password) === password;
    const response = this.options.loginResponses?.[attempt] ?? (matches ? "ok" : "rejected");

    if (response === "ok") {
      this.authenticated = true;
      this.view = { kind: "home" };
    } else if (response === "hang") {
      this.view = { kind: "login" };
    } else {
      this.view = { kind: "login", message: response === "captcha" ? "captcha" : "error" };
    }
  }

  render() {
    switch (this.view.kind) {
      case "blank":
        return "<html><body></body></html>";
      case "home":
        return `<html><body><h1>Indicadores</h1></body></html>`;
      case "login": {
        const message =
          this.view.message === "error"
            ? `<div class="login-error">Usuário ou senha inválidos</div>`
            : this.view.message === "captcha"
              ? `<div class="captcha">Confirme que você não é um robô</div>`
              : "";
        return `<html><body><form>${message}<input id="id_usuario"><input id="id_senha" type="password"><button id="botaoEfetuarLogin">Entrar</button></form></body></html>`;
      }
      case "listing":
        return this.renderListing(this.view.page);
    }
  }

  private renderListing(page: number) {
    const headers = this.options.headers ?? FAKE_PORTAL_HEADERS;
    const rows = this.options.pages[page - 1] ?? [];
    const head = `<tr>${headers.map((h) => `<th>${esc(h)}</th>`).join("")}</tr>`;
    const body =
      rows.length > 0
        ? rows.map((cells) => `<tr>${cells.map((c) => `<td>${esc(c)}</td>`).join("")}</tr>`).join("")
        : `<tr class="sem-registros"><td colspan="${headers.length}">Nenhum registro encontrado</td></tr>`;
    const next =
      page < this.totalPages
        ? `<a class="proxima" href="#">Próxima</a>`
        : `<a class="proxima disabled" aria-disabled="true">Próxima</a>`;
    return `<html><body><div class="pagina-atual">Página ${page} de ${this.totalPages}</div><table id="listagem_vendas"><thead>${head}</thead><tbody>${body}</tbody></table>${next}</body></html>`;
  }

  isVisible(selector: string) {
    return load(this.render())(selector).length > 0;
  }

  /** A page driver bound to this portal. */
  driver(): PortalPageDriver {
    return {
      goto: async (url: string) => {
        this.goto(url);
        return null;
      },
      url: () => `${FAKE_PORTAL_ORIGIN}${this.path()}`,
      content: async () => this.render(),
      fill: async (selector: string, value: string) => {
        this.fill(selector, value);
      },
      click: async (selector: string) => {
        this.click(selector);
      },
      isVisible: async (selector: string) => this.isVisible(selector)
    };
  }
}

export type FakeLauncher = {
  launcher: BrowserLauncher;
  launches: number;
  closes: number;
  artifactPhases: Array<"final" | "error">;
};

export function createFakeLauncher(portal: FakePortal, options: { failLaunch?: boolean } = {}): FakeLauncher {
  const state: FakeLauncher = {
    launches: 0,
    closes: 0,
    artifactPhases: [],
    launcher: async () => {
      if (options.failLaunch) {
        throw new SessionLaunchError("Failed to launch chromium: executable doesn't exist");
      }
      state.launches += 1;
      const handle: BrowserHandle = {
        newPage: async () => portal.driver(),
        clearCookies: async () => {
          portal.clearCookies();
        },
        captureArtifacts: async (phase) => {
          state.artifactPhases.push(phase);
        },
        close: async () => {
          state.closes += 1;
        }
      };
      return handle;
    }
  };
  return state;
}

/** A virtual clock: sleeps advance time instantly. */
export function createVirtualClock() {
  let now = 0;
  return {
    now: () => now,
    sleep: async (ms: number) => {
      now += ms;
    },
    elapsed: () => now
  };
}
