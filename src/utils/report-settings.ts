/**
 * Report Settings
 *
 * Handles file-based storage of the report-shaping settings.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { logFlow } from './logging.js';
import { ConfigurationError, describeError } from './errors.js';

export const SETTINGS_FILE_NAME = 'report-settings.json';

const reportSettingsSchema = z.object({
  zeroAcquisitionAccounts: z.array(z.string()).default([]),
  zeroQuantityNameFragments: z.array(z.string().min(1)).default([]),
  perHundredLotNominal: z.number().positive().default(100),
  tagAttributePolicy: z.enum(['first-wins', 'require-agreement']).default('first-wins'),
  reportOutputDirs: z.array(z.string().min(1)).min(1).default(['output']),
  mappingOutputDirs: z.array(z.string().min(1)).min(1).default(['output/mapping']),
  enabledReports: z.array(z.string()).optional()
});

export type ReportSettings = z.infer<typeof reportSettingsSchema>;

/**
 * Directory holding the settings file. DATA_DIR overrides the default
 * `./data` (useful for container deployments).
 */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.DATA_DIR || path.join(process.cwd(), 'data');
}

export function parseReportSettings(raw: unknown, source: string): ReportSettings {
  const parsed = reportSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const setting = issue && issue.path.length > 0 ? issue.path.join('.') : source;
    throw new ConfigurationError(setting, issue ? issue.message : 'invalid settings');
  }
  return parsed.data;
}

/**
 * Reads settings from `<dataDir>/report-settings.json`. A missing file yields
 * the defaults; an unreadable or invalid one is fatal.
 */
export async function loadReportSettings(dataDir: string = resolveDataDir()): Promise<ReportSettings> {
  const settingsFile = path.join(dataDir, SETTINGS_FILE_NAME);

  let contents: string;
  try {
    contents = await fs.readFile(settingsFile, 'utf8');
  } catch (readError: unknown) {
    if (readError instanceof Error && 'code' in readError && readError.code === 'ENOENT') {
      logFlow('REPORT_SETTINGS', 'INFO', `Settings file not found at ${settingsFile}, using defaults`);
      return parseReportSettings({}, settingsFile);
    }
    logFlow('REPORT_SETTINGS', 'ERROR', `Error reading settings from ${settingsFile}`, {
      errorMessage: describeError(readError)
    });
    throw readError;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (parseError) {
    throw new ConfigurationError(settingsFile, `not valid JSON (${describeError(parseError)})`);
  }

  const settings = parseReportSettings(raw, settingsFile);
  logFlow('REPORT_SETTINGS', 'INFO', `Successfully loaded settings from ${settingsFile}`, {
    tagAttributePolicy: settings.tagAttributePolicy,
    zeroAcquisitionAccounts: settings.zeroAcquisitionAccounts.length
  });
  return settings;
}
