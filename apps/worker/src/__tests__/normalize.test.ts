import { describe, expect, it } from "vitest";
import type { RawRecord, SalesRecord } from "@salesharvest/shared";
import { PT_BR_LOCALE, normalizeSalesRow, type NormalizeLocale } from "../normalize.js";

const US_LOCALE: NormalizeLocale = { decimalSeparator: ".", thousandsSeparator: ",", dateFormat: "MM/DD/YYYY" };

function raw(overrides: Partial<RawRecord> = {}): RawRecord {
  return {
    external_id: "P-1001",
    date: "03/02/2024",
    customer: "Loja Azul",
    product: "Caderno A4",
    quantity: "2",
    amount: "R$ 1.234,56",
    ...overrides
  };
}

/** Renders a record the way the portal prints it. */
function render(record: SalesRecord): RawRecord {
  const [year, month, day] = record.date.split("-");
  const [integer, fraction] = record.amount.toFixed(2).split(".");
  const grouped = (integer ?? "").replace(/\B(?=(\d{3})+(?!\d))/g, ".");
  return {
    external_id: record.externalId,
    date: `${day}/${month}/${year}`,
    customer: record.customer,
    product: record.product,
    quantity: `${record.quantity} un`,
    amount: `R$ ${grouped},${fraction}`
  };
}

describe("normalizeSalesRow", () => {
  it("parses a pt-BR row", () => {
    expect(normalizeSalesRow(raw())).toEqual({
      ok: true,
      record: {
        externalId: "P-1001",
        date: "2024-02-03",
        customer: "Loja Azul",
        product: "Caderno A4",
        quantity: 2,
        amount: 1234.56
      }
    });
  });

  it("round-trips records through the portal's formatting", () => {
    const records: SalesRecord[] = [
      { externalId: "P-1", date: "2024-02-29", customer: "Loja Azul", product: "Caneta", quantity: 0, amount: 0 },
      { externalId: "P-2", date: "1999-12-31", customer: "Papelaria Sol", product: "Caderno", quantity: 12, amount: 0.1 },
      { externalId: "P-3", date: "2023-07-04", customer: "Ateliê Mar", product: "Mochila", quantity: 1500, amount: 1234567.89 },
      { externalId: "P-4", date: "2024-01-15", customer: "Loja Azul", product: "Estorno", quantity: 1, amount: -12.3 }
    ];
    for (const record of records) {
      expect(normalizeSalesRow(render(record))).toEqual({ ok: true, record });
    }
  });

  it("collapses whitespace in text fields", () => {
    const result = normalizeSalesRow(raw({ customer: "  Loja   Azul ", external_id: " P-1001 " }));
    expect(result).toMatchObject({ ok: true, record: { externalId: "P-1001", customer: "Loja Azul" } });
  });

  it("ignores a trailing time on the date", () => {
    expect(normalizeSalesRow(raw({ date: "03/02/2024 14:05" }))).toMatchObject({ record: { date: "2024-02-03" } });
  });

  it("honours the configured locale", () => {
    const result = normalizeSalesRow(raw({ date: "02/03/2024", amount: "$1,234.50", quantity: "1,000" }), US_LOCALE);
    expect(result).toMatchObject({ ok: true, record: { date: "2024-02-03", amount: 1234.5, quantity: 1000 } });
  });

  describe("MissingKey", () => {
    it("rejects a blank external_id", () => {
      expect(normalizeSalesRow(raw({ external_id: "   " }))).toEqual({
        ok: false,
        rejection: { reason: "MissingKey", field: "external_id", detail: "external_id is empty" }
      });
    });

    it("takes precedence over other field errors", () => {
      const { external_id: _id, ...rest } = raw({ amount: "abc" });
      expect(normalizeSalesRow(rest)).toMatchObject({ ok: false, rejection: { reason: "MissingKey" } });
    });
  });

  describe("FieldParseError", () => {
    it.each([
      [{ quantity: "2,5" }, "quantity", 'quantity "2,5" is not a whole number'],
      [{ quantity: "-3" }, "quantity", 'quantity "-3" is negative'],
      [{ quantity: "dois" }, "quantity", 'quantity "dois" is not a number'],
      [{ quantity: "2.147.483.648" }, "quantity", 'quantity "2.147.483.648" is out of range'],
      [{ amount: "1.000.000.000.000,00" }, "amount", 'amount "1.000.000.000.000,00" is out of range'],
      [{ amount: "-1.000.000.000.000" }, "amount", 'amount "-1.000.000.000.000" is out of range'],
      [{ amount: "1,234" }, "amount", 'amount "1,234" has more than two decimals'],
      [{ amount: "1.5" }, "amount", 'amount "1.5" is not a number'],
      [{ amount: "" }, "amount", "amount is empty"],
      [{ date: "31/02/2024" }, "date", 'date "31/02/2024" is not a calendar date'],
      [{ date: "29/02/2023" }, "date", 'date "29/02/2023" is not a calendar date'],
      [{ date: "2024-02-03" }, "date", 'date "2024-02-03" does not match DD/MM/YYYY'],
      [{ customer: "   " }, "customer", "customer is empty"]
    ])("rejects %o", (overrides, field, detail) => {
      expect(normalizeSalesRow(raw(overrides))).toEqual({
        ok: false,
        rejection: { reason: "FieldParseError", field, detail }
      });
    });

    it("reports a missing column", () => {
      const { quantity: _quantity, ...rest } = raw();
      expect(normalizeSalesRow(rest)).toEqual({
        ok: false,
        rejection: { reason: "FieldParseError", field: "quantity", detail: "quantity column is missing" }
      });
    });
  });

  it("is deterministic and leaves its input untouched", () => {
    const input = raw({ customer: " Loja  Azul " });
    const snapshot = { ...input };
    expect(normalizeSalesRow(input, PT_BR_LOCALE)).toEqual(normalizeSalesRow(input, PT_BR_LOCALE));
    expect(input).toEqual(snapshot);
  });
});
