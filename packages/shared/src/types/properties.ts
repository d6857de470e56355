export type PropertyScalar = string | number | boolean | null;

/**
 * Values an extracted candidate may carry. Nested maps and dates are allowed
 * here; the normalizer flattens them before anything reaches the store.
 */
export type PropertyValue = PropertyScalar | Date | PropertyValue[] | PropertyMap;

export interface PropertyMap {
  [key: string]: PropertyValue;
}

export type StoredPropertyValue = PropertyScalar | StoredPropertyValue[];

export type StoredProperties = Record<string, StoredPropertyValue>;
