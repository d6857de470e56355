import { readFileSync } from "node:fs";
import { z } from "zod";
import { textOf, type PropertySource } from "../propertyAccess.js";

const lookupTable = z.record(z.string());

const addressLookupsSchema = z.object({
  streetSuffixes: lookupTable,
  directionals: lookupTable,
  cityPrefixes: lookupTable,
  cityDirections: lookupTable,
  cityAliases: lookupTable,
  states: lookupTable,
  stateAbbreviations: lookupTable,
  countries: lookupTable
});

type AddressLookups = { [K in keyof z.infer<typeof addressLookupsSchema>]: ReadonlyMap<string, string> };

function loadLookups(): AddressLookups {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("./address-lookups.json", import.meta.url), "utf8")
  );
  const parsed = addressLookupsSchema.parse(raw);
  const toMap = (table: Record<string, string>): ReadonlyMap<string, string> =>
    new Map(Object.entries(table));

  return {
    streetSuffixes: toMap(parsed.streetSuffixes),
    directionals: toMap(parsed.directionals),
    cityPrefixes: toMap(parsed.cityPrefixes),
    cityDirections: toMap(parsed.cityDirections),
    cityAliases: toMap(parsed.cityAliases),
    states: toMap(parsed.states),
    stateAbbreviations: toMap(parsed.stateAbbreviations),
    countries: toMap(parsed.countries)
  };
}

const lookups = loadLookups();

function tokens(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

export function normalizeStreet(raw: string): string {
  return tokens(raw.toLowerCase().replace(/[.,]/g, ""))
    .map((token) => lookups.streetSuffixes.get(token) ?? lookups.directionals.get(token) ?? token)
    .map((token) => token.replace(/\W/g, ""))
    .filter((token) => token.length > 0)
    .join(" ");
}

export function normalizeCity(raw: string): string {
  const head = raw.split(",")[0] ?? "";
  const city = tokens(head.toLowerCase().replace(/\./g, "").replace(/[^\w\s]/g, " "))
    .map((token) => lookups.cityPrefixes.get(token) ?? lookups.cityDirections.get(token) ?? token)
    .join(" ");
  return lookups.cityAliases.get(city) ?? city;
}

export function normalizeState(raw: string): string {
  const cleaned = tokens(raw.toLowerCase().replace(/\./g, "")).join(" ");
  if (cleaned.length === 0) {
    return "";
  }
  const code = lookups.states.get(cleaned) ?? lookups.stateAbbreviations.get(cleaned);
  if (code) {
    return code;
  }
  if (/^[a-z]{2}$/.test(cleaned)) {
    return cleaned.toUpperCase();
  }
  return raw.trim();
}

export function normalizeCountry(raw: string): string {
  const cleaned = tokens(raw.toLowerCase().replace(/\./g, "")).join(" ");
  if (cleaned.length === 0) {
    return "usa";
  }
  return lookups.countries.get(cleaned) ?? cleaned;
}

export function normalizePostalCode(raw: string): string {
  return raw.replace(/\D/g, "").slice(0, 5);
}

export interface NormalizedAddress {
  street: string;
  city: string;
  state: string;
  postalCode: string;
  country: string;
}

export const STREET_KEYS = ["street", "street_address", "address_line1", "address"];
export const CITY_KEYS = ["city", "locality", "town"];
export const STATE_KEYS = ["state", "province", "region"];
export const POSTAL_CODE_KEYS = ["postalCode", "postal_code", "zip", "zipcode", "zip_code"];
export const COUNTRY_KEYS = ["country", "country_code"];

export function extractAddress(properties: PropertySource): NormalizedAddress {
  return {
    street: normalizeStreet(textOf(properties, ...STREET_KEYS) ?? ""),
    city: normalizeCity(textOf(properties, ...CITY_KEYS) ?? ""),
    state: normalizeState(textOf(properties, ...STATE_KEYS) ?? ""),
    postalCode: normalizePostalCode(textOf(properties, ...POSTAL_CODE_KEYS) ?? ""),
    country: normalizeCountry(textOf(properties, ...COUNTRY_KEYS) ?? "")
  };
}

export function formatAddress(address: NormalizedAddress): string {
  return [address.street, address.city, address.state, address.postalCode, address.country]
    .filter((part) => part.length > 0)
    .join(" ");
}

/** Leading house number and the rest of the street; number is empty when absent. */
export function splitStreet(street: string): { number: string; name: string } {
  const match = /^(\d+[a-z]?)\s+(.+?)$/.exec(street);
  if (!match) {
    return { number: "", name: street };
  }
  return { number: match[1] ?? "", name: match[2] ?? "" };
}
