import * as dotenv from 'dotenv';
import { z } from 'zod';
import { FileLoader } from '../core/utils/FileLoader';

dotenv.config();

export const DEFAULT_MAX_BODY = 131072;
export const DEFAULT_SECTION = 'default';

export type ConfigErrorCode = 'LOADING_FILE' | 'SECTION_DOES_NOT_EXIST' | 'REQUIRED_OPTION_EDGERC' | 'REQUIRED_OPTION_ENV' | 'HOST_CONTAINS_SLASH_AT_THE_END';

export class ConfigError extends Error {
  constructor(
    public readonly code: ConfigErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Identifiants EdgeGrid d'un compte API.
 */
const edgeGridSchema = z.object({
  host: z.string().min(1),
  clientToken: z.string().min(1),
  clientSecret: z.string().min(1),
  accessToken: z.string().min(1),
  maxBody: z.coerce.number().int().positive().default(DEFAULT_MAX_BODY),
});

export type EdgeGridConfig = z.infer<typeof edgeGridSchema>;

// Réglages du client hors identifiants
const clientSettingsSchema = z.object({
  APPSEC_API_LIB: z.string().optional(),
  APPSEC_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  APPSEC_DEBUG: z.enum(['0', '1']).optional(),
});

export type ClientSettings = z.infer<typeof clientSettingsSchema>;

export function loadClientSettings(env: NodeJS.ProcessEnv = process.env): ClientSettings {
  const parsed = clientSettingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('REQUIRED_OPTION_ENV', `Configuration invalide : ${parsed.error.message}`);
  }
  return parsed.data;
}

function ensureHost(config: EdgeGridConfig): EdgeGridConfig {
  if (config.host.endsWith('/')) {
    throw new ConfigError('HOST_CONTAINS_SLASH_AT_THE_END', `host must not end with a slash: ${config.host}`);
  }
  return config;
}

/**
 * Lit les identifiants depuis l'environnement.
 * Section "default" : AKAMAI_HOST, AKAMAI_CLIENT_TOKEN… ; autre section : AKAMAI_<SECTION>_HOST…
 */
export function loadEdgeGridConfigFromEnv(section: string = DEFAULT_SECTION, env: NodeJS.ProcessEnv = process.env): EdgeGridConfig {
  const prefix = section.toLowerCase() === DEFAULT_SECTION ? 'AKAMAI_' : `AKAMAI_${section.toUpperCase()}_`;
  const names = {
    host: `${prefix}HOST`,
    clientToken: `${prefix}CLIENT_TOKEN`,
    clientSecret: `${prefix}CLIENT_SECRET`,
    accessToken: `${prefix}ACCESS_TOKEN`,
    maxBody: `${prefix}MAX_BODY`,
  };

  const parsed = edgeGridSchema.safeParse({
    host: env[names.host],
    clientToken: env[names.clientToken],
    clientSecret: env[names.clientSecret],
    accessToken: env[names.accessToken],
    maxBody: env[names.maxBody],
  });
  if (!parsed.success) {
    const envNames: Record<string, string> = names;
    const missing = parsed.error.issues.map((issue) => {
      const key = String(issue.path[0]);
      return envNames[key] ?? key;
    });
    throw new ConfigError('REQUIRED_OPTION_ENV', `required environment variables missing or invalid: ${missing.join(', ')}`);
  }
  return ensureHost(parsed.data);
}

const edgercSectionSchema = z.record(z.string(), z.unknown());
const edgercFileSchema = z.record(z.string(), z.unknown());

/**
 * Lit une section d'un fichier .edgerc (INI).
 * Clés : host, client_token, client_secret, access_token, max-body.
 */
export async function loadEdgeGridConfigFromFile(filePath: string, section: string = DEFAULT_SECTION): Promise<EdgeGridConfig> {
  let content: unknown;
  try {
    const meta = await FileLoader.getInstance().load(filePath, { format: '.ini' });
    content = meta.content;
  } catch (err) {
    throw new ConfigError('LOADING_FILE', `unable to load config from file ${filePath}`, { cause: err });
  }

  const file = edgercFileSchema.safeParse(content);
  const rawSection = file.success ? file.data[section] : undefined;
  const values = edgercSectionSchema.safeParse(rawSection);
  if (!values.success) {
    throw new ConfigError('SECTION_DOES_NOT_EXIST', `provided config section does not exist: ${section}`);
  }

  const entry = values.data;
  const parsed = edgeGridSchema.safeParse({
    host: entry.host,
    clientToken: entry.client_token,
    clientSecret: entry.client_secret,
    accessToken: entry.access_token,
    maxBody: entry['max-body'] ?? entry.max_body,
  });
  if (!parsed.success) {
    const missing = parsed.error.issues.map((issue) => String(issue.path[0]));
    throw new ConfigError('REQUIRED_OPTION_EDGERC', `required option is missing from edgerc section ${section}: ${missing.join(', ')}`);
  }
  return ensureHost(parsed.data);
}
