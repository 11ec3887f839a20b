/**
 * Request/Response DTOs with Zod validation schemas.
 */

import { z } from "zod";

// =============================================================================
// Apps
// =============================================================================

export const RegisterAppSchema = z.object({
  app: z.string().trim().min(1).max(256),
});

export type RegisterAppDto = z.infer<typeof RegisterAppSchema>;

// =============================================================================
// Events
// =============================================================================

export const ListEventsQuerySchema = z.object({
  afterPosition: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
