import { describe, expect, it } from "vitest";
import { ConfigError } from "@salesharvest/shared";
import { parsePlaywrightProfile, parsePortalProfile } from "../portalProfile.js";
import { safePrefix } from "../playwrightContext.js";

const validProfile = {
  loginUrl: "https://portal.example.com/login",
  listingUrl: "https://portal.example.com/vendas",
  loggedInUrlContains: "/indicadores/",
  selectors: {
    username: "#id_usuario",
    password: "#id_senha",
    submit: "#botaoEfetuarLogin",
    listingTable: "#listagem_vendas",
    nextPage: "a.proxima",
    captcha: "  "
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

describe("parsePortalProfile", () => {
  it("accepts a complete profile and drops blank optional selectors", () => {
    const profile = parsePortalProfile(validProfile);
    expect(profile.loginUrl).toBe("https://portal.example.com/login");
    expect(profile.selectors).toEqual({
      username: "#id_usuario",
      password: "#id_senha",
      submit: "#botaoEfetuarLogin",
      listingTable: "#listagem_vendas",
      nextPage: "a.proxima"
    });
    expect(profile.columns.amount).toBe("Valor");
    expect(profile.browser).toBeUndefined();
  });

  it("requires every column header", () => {
    const { amount: _amount, ...columns } = validProfile.columns;
    expect(() => parsePortalProfile({ ...validProfile, columns })).toThrow(
      "Invalid portal profile: columns.amount is required"
    );
  });

  it("rejects relative URLs", () => {
    expect(() => parsePortalProfile({ ...validProfile, listingUrl: "/vendas" })).toThrow(ConfigError);
  });

  it("needs a way to recognise a successful login", () => {
    const { loggedInUrlContains: _marker, ...rest } = validProfile;
    expect(() => parsePortalProfile(rest)).toThrow(
      "Invalid portal profile: set loggedInUrlContains or selectors.loggedInMarker"
    );
  });

  it("rejects non-objects", () => {
    expect(() => parsePortalProfile([])).toThrow("Invalid portal profile: expected a JSON object");
  });
});

describe("parsePlaywrightProfile", () => {
  it("keeps the recognised browser settings", () => {
    expect(
      parsePlaywrightProfile({
        browser_type: "firefox",
        locale: "pt-BR",
        viewport: { width: 1280.6, height: 720 },
        headless: false,
        slowMoMs: 50,
        initScripts: ["window.__test = 1;", " ", 3]
      })
    ).toEqual({
      browserType: "firefox",
      locale: "pt-BR",
      viewport: { width: 1280, height: 720 },
      headless: false,
      slowMoMs: 50,
      initScripts: ["window.__test = 1;"]
    });
  });

  it("returns undefined when nothing is set", () => {
    expect(parsePlaywrightProfile({ browserType: "netscape" })).toBeUndefined();
  });
});

describe("safePrefix", () => {
  it("turns a run id into a file-name prefix", () => {
    expect(safePrefix(" run 42/retry ")).toBe("run_42_retry_");
    expect(safePrefix(undefined)).toBe("");
  });
});
