/**
 * Zod schemas for configuration validation
 *
 * Types are inferred from the schemas. `FileConfigSchema` describes what a
 * YAML file may contain (everything optional); `ConfigSchema` describes the
 * fully merged configuration the application runs with.
 */

import { z } from 'zod';
import { NotificationLevelSchema } from '../notifications/notification-level.js';

/**
 * CSS selectors for the WooCommerce account pages
 */
export const SelectorsSchema = z.object({
  downloadsTable: z.string().min(1).describe('Table listing purchased downloads'),
  titleCell: z.string().min(1).describe('Cell holding the product title'),
  fileCell: z.string().min(1).describe('Cell holding the download link'),
  fileLink: z.string().min(1).describe('Anchor inside the file cell'),
  accountMarker: z.string().min(1).describe('Element present on any signed-in account page'),
});

export type Selectors = z.infer<typeof SelectorsSchema>;

export const SiteSchema = z.object({
  baseUrl: z.url().describe('Site origin, e.g. https://www.dancarlin.com'),
  loginPath: z.string().startsWith('/').describe('Login form path'),
  downloadsPath: z.string().startsWith('/').describe('Account downloads page path'),
  accountPathMarker: z.string().min(1).describe('Path segment that proves the login landed in the account area'),
  userAgent: z.string().optional().describe('User-Agent header override'),
  selectors: SelectorsSchema,
});

export type SiteConfig = z.infer<typeof SiteSchema>;

export const CredentialsSchema = z.object({
  username: z.string().min(1, 'Cannot be empty'),
  password: z.string().min(1, 'Cannot be empty'),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

export const DownloadSettingsSchema = z.object({
  outputDir: z.string().min(1).describe('Directory to save episodes into'),
  maxConcurrent: z.number().int().positive().describe('Number of simultaneous downloads'),
  fallbackPrefix: z.string().describe('Prefix for names built from the download_file parameter'),
  extension: z
    .string()
    .regex(/^\.[A-Za-z0-9]+$/, { message: 'Must look like ".mp3"' })
    .describe('Extension forced onto every file name'),
});

export type DownloadSettings = z.infer<typeof DownloadSettingsSchema>;

export const NotificationSettingsSchema = z.object({
  consoleMinLevel: NotificationLevelSchema.describe('Minimum notification level for console output'),
});

export const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'SUCCESS', 'WARNING', 'ERROR', 'HIGHLIGHT']);

/**
 * Main configuration schema
 */
export const ConfigSchema = z.object({
  site: SiteSchema,
  credentials: CredentialsSchema.partial().optional(),
  download: DownloadSettingsSchema,
  notifications: NotificationSettingsSchema,
  logLevel: LogLevelSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Shape accepted from a YAML file; unknown top-level keys are rejected
 */
export const FileConfigSchema = z.strictObject({
  site: SiteSchema.extend({ selectors: SelectorsSchema.partial().optional() })
    .partial()
    .optional(),
  credentials: CredentialsSchema.partial().optional(),
  download: DownloadSettingsSchema.partial().optional(),
  notifications: NotificationSettingsSchema.partial().optional(),
  logLevel: LogLevelSchema.optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.map(String).join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}

/**
 * Validate with custom error formatting
 */
export function validateConfigSafe(raw: unknown): { success: true; config: Config } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(raw);
  if (result.success) {
    return { success: true, config: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}
