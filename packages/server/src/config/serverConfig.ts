/**
 * @fileoverview Server configuration loading from YAML.
 * Validates and caches configuration for the session server.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const ServerConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    maxPayloadBytes: z.number().int().positive(),
    maxQueuedMessages: z.number().int().positive(),
  }),
  tokens: z.object({
    bytes: z.number().int().min(12).max(64),
  }),
  board: z
    .object({
      columns: z.number().int().positive(),
      rows: z.number().int().positive(),
      connect: z.number().int().min(2),
    })
    .refine((board) => board.connect <= Math.max(board.columns, board.rows), {
      message: 'connect must fit on the board',
    }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

let cachedConfig: ServerConfig | null = null;

/**
 * Validate a raw configuration object.
 * @throws {Error} if the configuration does not match the schema
 */
export function parseServerConfig(rawConfig: unknown): ServerConfig {
  const result = ServerConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid server configuration: ${details}`);
  }
  return result.data;
}

/**
 * Load and validate server configuration from YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/server.yaml relative to cwd (project root)
 *
 * PORT, when set, overrides server.port.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const configPath = env['CONFIG_PATH'] ?? join(process.cwd(), 'config/server.yaml');
  const fileContents = readFileSync(configPath, 'utf8');
  const config = parseServerConfig(parseYaml(fileContents) as unknown);

  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const portOverride = env['PORT'];
  if (portOverride !== undefined && portOverride !== '') {
    const port = Number(portOverride);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new Error(`Invalid server configuration: PORT must be a port number, got "${portOverride}"`);
    }
    cachedConfig = { ...config, server: { ...config.server, port } };
  } else {
    cachedConfig = config;
  }

  return cachedConfig;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
