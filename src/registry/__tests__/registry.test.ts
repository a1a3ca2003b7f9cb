import { describe, expect, test } from "@jest/globals";
import {
  buildKnownSources,
  countActiveSources,
  extractCatalogSources,
  extractTenantSources,
  normalizeSourceName,
} from "..";
import type { CatalogSource, TenantSource } from "../../types";

const catalogSource = (name: string, active = true): CatalogSource => ({
  name,
  url: "",
  description: "",
  active,
  type: "",
});

const tenantSource = (name: string, tenant = "geocodes"): TenantSource => ({
  name,
  tenant,
  active: true,
});

describe("extractCatalogSources", () => {
  test("reads a sources list and skips entries without a name", () => {
    const sources = extractCatalogSources({
      sources: [
        { name: "iris", url: "https://example.org/iris.xml", sourcetype: "sitemap", propername: "IRIS" },
        { name: "retired", active: false },
        { url: "https://example.org/anonymous.xml" },
      ],
    });

    expect(sources).toEqual([
      {
        name: "iris",
        url: "https://example.org/iris.xml",
        description: "IRIS",
        active: true,
        type: "sitemap",
      },
      { name: "retired", url: "", description: "", active: false, type: "" },
    ]);
  });

  test("reads a sources mapping keyed by name", () => {
    const sources = extractCatalogSources({
      sources: {
        iris: { url: "https://example.org/iris.xml", type: "sitemap" },
        obis: null,
      },
    });

    expect(sources).toEqual([
      { name: "iris", url: "https://example.org/iris.xml", description: "", active: true, type: "sitemap" },
      { name: "obis", url: "", description: "", active: true, type: "" },
    ]);
  });

  test("accepts a bare top-level list", () => {
    expect(extractCatalogSources([{ name: "iris" }]).map((s) => s.name)).toEqual(["iris"]);
  });

  test("reads textual active flags", () => {
    const sources = extractCatalogSources({
      sources: [
        { name: "a", active: "false" },
        { name: "b", active: "yes" },
      ],
    });

    expect(sources.map((s) => s.active)).toEqual([false, true]);
  });

  test("absent or malformed documents yield an empty list", () => {
    expect(extractCatalogSources(null)).toEqual([]);
    expect(extractCatalogSources(undefined)).toEqual([]);
    expect(extractCatalogSources("just text")).toEqual([]);
    expect(extractCatalogSources(42)).toEqual([]);
    expect(extractCatalogSources({ sources: "iris" })).toEqual([]);
    expect(extractCatalogSources({})).toEqual([]);
  });
});

describe("extractTenantSources", () => {
  test("reads a tenant list", () => {
    const sources = extractTenantSources({
      tenant: [{ community: "geocodes", sources: ["iris", "opentopography"] }],
    });

    expect(sources).toEqual([
      { name: "iris", tenant: "geocodes", active: true },
      { name: "opentopography", tenant: "geocodes", active: true },
    ]);
  });

  test("reads a tenants mapping, including bare source lists", () => {
    const sources = extractTenantSources({
      tenants: {
        oceans: { sources: ["bcodmo", { name: "obis" }] },
        polar: ["arctic"],
      },
    });

    expect(sources).toEqual([
      { name: "bcodmo", tenant: "oceans", active: true },
      { name: "obis", tenant: "oceans", active: true },
      { name: "arctic", tenant: "polar", active: true },
    ]);
  });

  test("falls back to the default tenant label", () => {
    expect(extractTenantSources({ tenant: [{ sources: ["iris"] }] })).toEqual([
      { name: "iris", tenant: "default", active: true },
    ]);
  });

  test("absent or malformed documents yield an empty list", () => {
    expect(extractTenantSources(null)).toEqual([]);
    expect(extractTenantSources(["iris"])).toEqual([]);
    expect(extractTenantSources({ tenant: "geocodes" })).toEqual([]);
    expect(extractTenantSources({ other: [] })).toEqual([]);
  });
});

describe("buildKnownSources", () => {
  test("lowercases, deduplicates and sorts both families", () => {
    const known = buildKnownSources(
      [catalogSource("Iris"), catalogSource(" OBIS ")],
      [tenantSource("iris"), tenantSource("bcodmo")],
    );

    expect(known).toEqual(["bcodmo", "iris", "obis"]);
  });

  test("normalizeSourceName trims and lowercases", () => {
    expect(normalizeSourceName("  OpenTopography ")).toBe("opentopography");
  });
});

describe("countActiveSources", () => {
  test("prefers distinct tenant sources", () => {
    const count = countActiveSources(
      [catalogSource("a"), catalogSource("b"), catalogSource("c")],
      [tenantSource("iris"), tenantSource("IRIS", "oceans"), tenantSource("obis")],
    );

    expect(count).toEqual({ count: 2, origin: "tenant" });
  });

  test("falls back to active catalog sources", () => {
    const count = countActiveSources([catalogSource("a"), catalogSource("b", false)], []);

    expect(count).toEqual({ count: 1, origin: "catalog" });
  });

  test("reports zero when neither family has sources", () => {
    expect(countActiveSources([catalogSource("a", false)], [])).toEqual({ count: 0, origin: "none" });
  });
});
