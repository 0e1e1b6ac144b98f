import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { type Country, countriesFileSchema, countrySchema } from "@shared/schema";
import { formatIssues } from "./utils";

export const DEFAULT_COUNTRIES_FILE = fileURLToPath(
  new URL("./data/countries.json", import.meta.url),
);

export class DatasetError extends Error {
  readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super(filePath ? `${message} (${filePath})` : message);
    this.name = "DatasetError";
    this.filePath = filePath;
  }
}

export interface IStorage {
  getAll(): Promise<readonly Country[]>;
  getByCode(code: string): Promise<Country | undefined>;
  getRegions(): Promise<readonly string[]>;
  getByRegion(region: string): Promise<Country[]>;
}

// Codes are stored upper case; lookups are normalized to that format
export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

export function parseCountries(raw: unknown, filePath?: string): Country[] {
  const result = countriesFileSchema.safeParse(raw);
  if (!result.success) {
    throw new DatasetError(`Invalid country dataset: ${formatIssues(result.error)}`, filePath);
  }

  const seen = new Set<string>();
  for (const country of result.data.countries) {
    if (seen.has(country.code)) {
      throw new DatasetError(`Duplicate country code: ${country.code}`, filePath);
    }
    seen.add(country.code);
  }

  return result.data.countries;
}

export function loadCountries(filePath: string = DEFAULT_COUNTRIES_FILE): Country[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DatasetError(`Failed to read country dataset: ${reason}`, filePath);
  }
  return parseCountries(raw, filePath);
}

// Records may carry nested pass-through values; freeze those too
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class MemStorage implements IStorage {
  private readonly countries: readonly Country[];
  private readonly byCode: Map<string, Country>;
  private readonly regions: readonly string[];

  constructor(countries: Country[]) {
    this.countries = Object.freeze(
      countries.map((country, index) => {
        const result = countrySchema.safeParse(country);
        if (!result.success) {
          throw new DatasetError(`Invalid country at index ${index}: ${formatIssues(result.error)}`);
        }
        return deepFreeze(structuredClone(result.data));
      }),
    );
    this.byCode = new Map();

    const regions: string[] = [];
    for (const country of this.countries) {
      if (this.byCode.has(country.code)) {
        throw new DatasetError(`Duplicate country code: ${country.code}`);
      }
      this.byCode.set(country.code, country);
      if (!regions.includes(country.region)) {
        regions.push(country.region);
      }
    }
    this.regions = Object.freeze(regions);
  }

  async getAll(): Promise<readonly Country[]> {
    return this.countries;
  }

  async getByCode(code: string): Promise<Country | undefined> {
    return this.byCode.get(normalizeCode(code));
  }

  async getRegions(): Promise<readonly string[]> {
    return this.regions;
  }

  async getByRegion(region: string): Promise<Country[]> {
    return this.countries.filter((country) => country.region === region);
  }
}

export function createStorage(filePath?: string): MemStorage {
  return new MemStorage(loadCountries(filePath));
}
