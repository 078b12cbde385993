import { z } from "zod";

export const fleetCredentialsSchema = z.object({
  clientId: z.string().min(1, "Client ID is required"),
  clientSecret: z.string().min(1, "Client secret is required"),
  authUrl: z.string().url(),
  baseUrl: z.string().url(),
});

export const syncYearSchema = z.coerce
  .number()
  .int()
  .min(2000, "Year must be 2000 or later")
  .max(2100, "Year must be 2100 or earlier");

export type FleetCredentials = z.infer<typeof fleetCredentialsSchema>;
