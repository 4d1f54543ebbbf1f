import { describe, expect, it } from "vitest";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { validateRequest } from "../../src/validate/validate.js";
import type { ArvEngineInputs } from "../../src/types/inputs.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturesDir = join(__dirname, "../../../../testcases/arv_engine_v0/fixtures");

function loadFixture(name: string): ArvEngineInputs {
  return JSON.parse(readFileSync(join(fixturesDir, name), "utf8"));
}

describe("validateRequest", () => {
  it.each(["maple_street_flip.json", "harbor_road_flip.json", "thin_market_strict.json"])(
    "accepts %s",
    (name) => {
      const result = validateRequest(loadFixture(name));
      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
    },
  );

  it("returns the typed request on success", () => {
    const result = validateRequest(loadFixture("harbor_road_flip.json"));
    if (!result.valid) {
      throw new Error(result.errors.join("\n"));
    }
    expect(result.request.subject.id).toBe("subject-harbor-77");
  });

  it("rejects an unknown contract version", () => {
    const request = loadFixture("maple_street_flip.json");
    const result = validateRequest({ ...request, contract: { ...request.contract, contract_version: "ARV_ENGINE_V9" } });
    expect(result.errors).toEqual(["/contract/contract_version: must be equal to constant"]);
  });

  it("rejects a malformed analysis date", () => {
    const request = loadFixture("maple_street_flip.json");
    const result = validateRequest({ ...request, analysis: { ...request.analysis, as_of_date: "10/01/2026" } });
    expect(result.errors).toEqual(['/analysis/as_of_date: must match format "date"']);
  });

  it("rejects a non-positive purchase price", () => {
    const request = loadFixture("maple_street_flip.json");
    const result = validateRequest({ ...request, analysis: { ...request.analysis, purchase_price: 0 } });
    expect(result.errors).toEqual(["/analysis/purchase_price: must be > 0"]);
  });

  it("rejects unknown subject fields", () => {
    const request = loadFixture("maple_street_flip.json");
    const result = validateRequest({ ...request, subject: { ...request.subject, pool: true } });
    expect(result.errors).toEqual(["/subject: must NOT have unevaluated properties"]);
  });

  it("requires sale fields on comparables", () => {
    const request = loadFixture("thin_market_strict.json");
    const [first, ...rest] = request.comparables;
    if (!first) {
      throw new Error("fixture has no comparables");
    }
    const { sale_price: _salePrice, ...unsold } = first;
    const result = validateRequest({ ...request, comparables: [unsold, ...rest] });
    expect(result.errors).toEqual(["/comparables/0: must have required property 'sale_price'"]);
  });

  it("rejects a comparable sale date without a day", () => {
    const request = loadFixture("thin_market_strict.json");
    const [first, ...rest] = request.comparables;
    if (!first) {
      throw new Error("fixture has no comparables");
    }
    const result = validateRequest({ ...request, comparables: [{ ...first, sale_date: "2026-04" }, ...rest] });
    expect(result.errors).toEqual(['/comparables/0/sale_date: must match format "date"']);
  });

  it("rejects a non-object request", () => {
    expect(validateRequest("not a request").errors).toEqual(["/: must be object"]);
  });
});
