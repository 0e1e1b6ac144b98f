import { z } from "zod";

// ISO 3166-1 alpha-2, stored upper case
export const countryCodeSchema = z
  .string()
  .regex(/^[A-Z]{2}$/, "Country code must be two upper-case letters");

export const countrySchema = z
  .object({
    code: countryCodeSchema,
    name: z.string().min(1),
    region: z.string().min(1),
    capital: z.string().min(1),
    // ISO 4217
    currency: z.string().regex(/^[A-Z]{3}$/, "Currency must be a three-letter code"),
  })
  .passthrough();

export type Country = z.infer<typeof countrySchema>;

export const countriesFileSchema = z.object({
  countries: z.array(countrySchema),
});

export const errorBodySchema = z.object({
  error: z.string(),
});
