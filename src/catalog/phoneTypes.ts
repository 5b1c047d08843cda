/**
 * Phone record type and the zod schema used to validate catalog seed files.
 */

import { z } from 'zod';

/**
 * Spec fields are free-form text as published by the catalog source;
 * a missing value is stored as an empty string.
 */
export const phoneRecordSchema = z.object({
  modelName: z.string().trim().min(1),
  releaseDate: z.string().default(''),
  display: z.string().default(''),
  battery: z.string().default(''),
  camera: z.string().default(''),
  ram: z.string().default(''),
  storage: z.string().default(''),
  price: z.string().default(''),
  chipset: z.string().default(''),
  os: z.string().default(''),
  body: z.string().default(''),
  url: z.string().default(''),
});

export const phoneCatalogSchema = z.array(phoneRecordSchema);

export type PhoneRecord = Readonly<z.infer<typeof phoneRecordSchema>>;
