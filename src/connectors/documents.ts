import { readFile } from "fs/promises";
import { isAbsolute, join } from "path";
import yaml from "js-yaml";
import { logger, errorMessage } from "../logger";
import { fetchText } from "./base";

export interface RegistryDocumentSource {
  loadCatalog(): Promise<unknown>;
  loadTenants(): Promise<unknown>;
}

function isUrl(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

/** YAML parser also covers JSON documents. */
export function parseDocument(text: string, location: string): unknown {
  try {
    return yaml.load(text) ?? null;
  } catch (error) {
    logger.warn(`Document ${location} is not valid YAML/JSON: ${errorMessage(error)}`);
    return null;
  }
}

export async function loadDocument(
  location: string | undefined,
  baseDir: string,
  timeoutMs: number,
): Promise<unknown> {
  if (!location) return null;

  if (isUrl(location)) {
    const result = await fetchText({ url: location, timeoutMs });
    if (!result.success || result.data === null) {
      logger.warn(`Could not fetch document ${location}: ${result.error}`);
      return null;
    }
    return parseDocument(result.data, location);
  }

  const path = isAbsolute(location) ? location : join(baseDir, location);
  try {
    return parseDocument(await readFile(path, "utf-8"), path);
  } catch (error) {
    logger.warn(`Could not read document ${path}: ${errorMessage(error)}`);
    return null;
  }
}

export class ConfiguredDocumentSource implements RegistryDocumentSource {
  constructor(
    private readonly catalogLocation: string | undefined,
    private readonly tenantLocation: string | undefined,
    private readonly baseDir: string,
    private readonly timeoutMs: number,
  ) {}

  loadCatalog(): Promise<unknown> {
    return loadDocument(this.catalogLocation, this.baseDir, this.timeoutMs);
  }

  loadTenants(): Promise<unknown> {
    return loadDocument(this.tenantLocation, this.baseDir, this.timeoutMs);
  }
}
