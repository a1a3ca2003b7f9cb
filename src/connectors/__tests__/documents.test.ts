import { afterEach, describe, expect, jest, test } from "@jest/globals";
import { join } from "path";
import { ConfiguredDocumentSource, loadDocument, parseDocument } from "../documents";
import { extractCatalogSources, extractTenantSources } from "../../registry";

const CONFIG_DIR = join(__dirname, "../../../config");

describe("parseDocument", () => {
  test("parses YAML and JSON", () => {
    expect(parseDocument("sources:\n  - name: iris\n", "inline")).toEqual({ sources: [{ name: "iris" }] });
    expect(parseDocument("{\"tenant\": []}", "inline")).toEqual({ tenant: [] });
  });

  test("invalid or empty documents are null", () => {
    expect(parseDocument("sources: [unclosed", "inline")).toBeNull();
    expect(parseDocument("", "inline")).toBeNull();
  });
});

describe("loadDocument", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("reads files relative to the config directory", async () => {
    const doc = await loadDocument("documents/production-gleanerconfig.yaml", CONFIG_DIR, 1000);

    expect(extractCatalogSources(doc).map((s) => [s.name, s.active])).toEqual([
      ["iris", true],
      ["opentopography", true],
      ["bcodmo", false],
    ]);
  });

  test("missing locations and files are null", async () => {
    await expect(loadDocument(undefined, CONFIG_DIR, 1000)).resolves.toBeNull();
    await expect(loadDocument("documents/missing.yaml", CONFIG_DIR, 1000)).resolves.toBeNull();
  });

  test("fetches http locations", async () => {
    jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response("tenant:\n  - community: geocodes\n    sources: [iris]\n"));

    const doc = await loadDocument("https://example.org/tenant.yaml", CONFIG_DIR, 1000);

    expect(extractTenantSources(doc)).toEqual([{ name: "iris", tenant: "geocodes", active: true }]);
  });

  test("failed fetches are null", async () => {
    jest.spyOn(globalThis, "fetch").mockResolvedValue(new Response("gone", { status: 404 }));

    await expect(loadDocument("https://example.org/tenant.yaml", CONFIG_DIR, 1000)).resolves.toBeNull();
  });
});

describe("ConfiguredDocumentSource", () => {
  test("loads both shipped documents", async () => {
    const source = new ConfiguredDocumentSource(
      "documents/production-gleanerconfig.yaml",
      "documents/production-tenant.yaml",
      CONFIG_DIR,
      1000,
    );

    const tenants = extractTenantSources(await source.loadTenants());

    expect(tenants.map((t) => `${t.tenant}/${t.name}`)).toEqual([
      "geocodes/iris",
      "geocodes/opentopography",
      "oceans/bcodmo",
    ]);
    expect(extractCatalogSources(await source.loadCatalog())).toHaveLength(3);
  });
});
