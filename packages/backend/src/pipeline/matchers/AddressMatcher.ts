import { stringSimilarity } from "../similarity.js";
import type { PropertySource } from "../propertyAccess.js";
import {
  CITY_KEYS,
  COUNTRY_KEYS,
  POSTAL_CODE_KEYS,
  STATE_KEYS,
  STREET_KEYS,
  extractAddress,
  formatAddress,
  splitStreet,
  type NormalizedAddress
} from "./addressNormalization.js";
import { BaseNodeMatcher } from "./BaseNodeMatcher.js";
import type { EqualityMethod } from "./types.js";

const EARTH_RADIUS_METERS = 6_371_000;
const PROXIMITY_LIMIT_METERS = 50;

interface Coordinates {
  latitude: number;
  longitude: number;
}

function readCoordinate(properties: PropertySource, keys: string[]): number | undefined {
  for (const key of keys) {
    const value = properties[key];
    const numeric = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    if (typeof numeric === "number" && Number.isFinite(numeric)) {
      return numeric;
    }
  }
  return undefined;
}

function readCoordinates(properties: PropertySource): Coordinates | null {
  const latitude = readCoordinate(properties, ["latitude", "lat"]);
  const longitude = readCoordinate(properties, ["longitude", "lng", "lon"]);
  if (latitude === undefined || longitude === undefined) {
    return null;
  }
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    return null;
  }
  return { latitude, longitude };
}

export function haversineMeters(a: Coordinates, b: Coordinates): number {
  const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

function statesAgree(a: string, b: string): boolean {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left === right || left.includes(right) || right.includes(left);
}

export class AddressMatcher extends BaseNodeMatcher {
  readonly kind = "address";

  protected readonly methods: readonly EqualityMethod[] = [
    {
      id: "normalized_address_match",
      weight: 1,
      evaluate: (a, b) => this.normalizedAddressMatch(extractAddress(a), extractAddress(b))
    },
    {
      id: "street_number_street_name_match",
      weight: 0.9,
      evaluate: (a, b) => this.streetMatch(extractAddress(a), extractAddress(b))
    },
    {
      id: "city_state_zip_match",
      weight: 0.4,
      evaluate: (a, b) => this.cityStateZipMatch(extractAddress(a), extractAddress(b))
    },
    {
      id: "coordinate_proximity_match",
      weight: 0.8,
      evaluate: (a, b) => this.coordinateProximityMatch(a, b)
    }
  ];

  override embeddingProperties(): string[] {
    return ["name", "street", "city", "state", "postalCode", "country", "notes"];
  }

  override similarityThreshold(): number {
    return 0.75;
  }

  identifyingFields(): string[] {
    return ["street", "city", "state", "postalCode", "country", "latitude", "longitude"];
  }

  override projectionFields(): string[] {
    return [
      ...new Set([
        ...super.projectionFields(),
        ...STREET_KEYS,
        ...CITY_KEYS,
        ...STATE_KEYS,
        ...POSTAL_CODE_KEYS,
        ...COUNTRY_KEYS,
        "lat",
        "lng",
        "lon"
      ])
    ];
  }

  private normalizedAddressMatch(a: NormalizedAddress, b: NormalizedAddress): number | null {
    if (a.street.length === 0 || b.street.length === 0) {
      return null;
    }
    const left = formatAddress(a);
    const right = formatAddress(b);
    if (left === right) {
      return 1;
    }
    return left.includes(right) || right.includes(left) ? 0.9 : null;
  }

  private streetMatch(a: NormalizedAddress, b: NormalizedAddress): number | null {
    if (a.street.length === 0 || b.street.length === 0) {
      return null;
    }
    if (a.street === b.street) {
      return 1;
    }

    const left = splitStreet(a.street);
    const right = splitStreet(b.street);
    const nameSimilarity = stringSimilarity(left.name, right.name);

    if (left.number.length > 0 && right.number.length > 0) {
      return left.number === right.number && nameSimilarity >= 0.8 ? nameSimilarity : null;
    }
    return nameSimilarity >= 0.85 ? nameSimilarity : null;
  }

  // Only for partial addresses: two full addresses are judged by their streets.
  private cityStateZipMatch(a: NormalizedAddress, b: NormalizedAddress): number | null {
    if (a.street.length > 0 && b.street.length > 0) {
      return null;
    }

    const hasCity = a.city.length > 0 && b.city.length > 0;
    const hasState = a.state.length > 0 && b.state.length > 0;
    const hasZip = a.postalCode.length > 0 && b.postalCode.length > 0;
    const citySimilarity = hasCity ? stringSimilarity(a.city, b.city) : 0;
    const stateSimilarity = hasState ? (statesAgree(a.state, b.state) ? 1 : stringSimilarity(a.state, b.state)) : 0;
    const zipEqual = hasZip && a.postalCode === b.postalCode;

    const cityEqual = hasCity && citySimilarity === 1;
    const stateEqual = hasState && stateSimilarity === 1;
    const fires =
      (cityEqual && stateEqual) ||
      (zipEqual && cityEqual) ||
      (zipEqual && hasCity && citySimilarity >= 0.7 && (!hasState || stateSimilarity >= 0.7));
    if (!fires) {
      return null;
    }

    const components: number[] = [];
    if (hasCity) {
      components.push(citySimilarity);
    }
    if (hasState) {
      components.push(stateSimilarity);
    }
    if (hasZip) {
      components.push(zipEqual ? 1 : 0);
    }
    return components.reduce((sum, value) => sum + value, 0) / components.length;
  }

  private coordinateProximityMatch(a: PropertySource, b: PropertySource): number | null {
    const left = readCoordinates(a);
    const right = readCoordinates(b);
    if (!left || !right) {
      return null;
    }
    const distance = haversineMeters(left, right);
    if (distance > PROXIMITY_LIMIT_METERS) {
      return null;
    }
    return Math.max(0.5, 1 - distance / PROXIMITY_LIMIT_METERS);
  }
}
