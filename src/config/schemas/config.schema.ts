import { z } from 'zod';

// =============================================================================
// Jellyfin Connection
// =============================================================================

export const JellyfinConfigSchema = z.object({
  host: z.string().min(1, 'host is required'),
  port: z.number().int().min(1).max(65535).default(8096),
  useSsl: z.boolean().default(false),
  verifySsl: z.boolean().default(true),
  apiKey: z.string().min(1, 'apiKey is required'),
  timeoutMs: z.number().int().positive().default(10000),
});

// =============================================================================
// Background Work
// =============================================================================

export const PollingConfigSchema = z.object({
  intervalSeconds: z.number().positive().default(2),
  failureThreshold: z.number().int().min(1).default(3),
  maxBackoffSeconds: z.number().positive().default(60),
  staleTolerancePolls: z.number().int().nonnegative().default(1),
});

export const SensorsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  intervalSeconds: z.number().positive().default(60),
});

export const CommandsConfigSchema = z.object({
  /** Delay before the session refresh that follows a command */
  refreshDelayMs: z.number().int().nonnegative().default(500),
});

// =============================================================================
// Control Server
// =============================================================================

export const ServerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(1).max(65535).default(9090),
});

// =============================================================================
// Main Configuration Schema
// =============================================================================

export const FinbridgeConfigSchema = z.object({
  jellyfin: JellyfinConfigSchema,
  polling: PollingConfigSchema.default({}),
  sensors: SensorsConfigSchema.default({}),
  commands: CommandsConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
});

// =============================================================================
// Type Exports
// =============================================================================

export type JellyfinConfig = z.infer<typeof JellyfinConfigSchema>;
export type PollingConfig = z.infer<typeof PollingConfigSchema>;
export type SensorsConfig = z.infer<typeof SensorsConfigSchema>;
export type CommandsConfig = z.infer<typeof CommandsConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type FinbridgeConfig = z.infer<typeof FinbridgeConfigSchema>;
