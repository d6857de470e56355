import { z } from "zod";
import type { PropertyValue, StoredPropertyValue } from "@graphmerge/shared";

export const propertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.date(),
    z.array(propertyValueSchema),
    z.record(propertyValueSchema)
  ])
);

export const propertyMapSchema = z.record(propertyValueSchema);

export const storedPropertyValueSchema: z.ZodType<StoredPropertyValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(storedPropertyValueSchema)])
);

export const storedPropertiesSchema = z.record(storedPropertyValueSchema);
