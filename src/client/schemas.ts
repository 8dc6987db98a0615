/**
 * Response schemas for the Vault HTTP API
 */

import { z } from 'zod';

export const InitStatusSchema = z.object({
  initialized: z.boolean(),
});

export const HealthSchema = z
  .object({
    initialized: z.boolean(),
    sealed: z.boolean(),
    standby: z.boolean(),
    version: z.string(),
    cluster_name: z.string().optional(),
  })
  .passthrough();

export const TokenLookupSchema = z.object({
  data: z
    .object({
      id: z.string(),
      policies: z.array(z.string()).default([]),
      ttl: z.number().default(0),
      display_name: z.string().optional(),
    })
    .passthrough(),
});

export const SecretSchema = z
  .object({
    request_id: z.string().optional(),
    lease_id: z.string().optional(),
    lease_duration: z.number().optional(),
    renewable: z.boolean().optional(),
    data: z.record(z.unknown()).nullable().default(null),
    warnings: z.array(z.string()).nullable().optional(),
  })
  .passthrough();

export const ErrorBodySchema = z.object({
  errors: z.array(z.string()).default([]),
});

export type InitStatus = z.infer<typeof InitStatusSchema>;
export type HealthStatus = z.infer<typeof HealthSchema>;
export type TokenLookup = z.infer<typeof TokenLookupSchema>;
export type Secret = z.infer<typeof SecretSchema>;
