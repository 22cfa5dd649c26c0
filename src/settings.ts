import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import { DEFAULT_STYLE } from './citations/referenceStyles.js';

export type CiteSettings = {
  defaultStyle: string;
  quiet: boolean;
};

const DEFAULT_SETTINGS: CiteSettings = {
  defaultStyle: DEFAULT_STYLE,
  quiet: false,
};

const settingsFileSchema = z
  .object({
    defaultStyle: z.string().trim().min(1).optional(),
    quiet: z.boolean().optional(),
  })
  .passthrough();

type Env = Record<string, string | undefined>;

export function getSettingsPath(env: Env = process.env): string {
  const override = env.CITE_MD_SETTINGS_PATH;
  if (override && override.trim()) return override.trim();
  return path.join(os.homedir(), '.cite-md', 'settings.yaml');
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') return true;
  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === '') return false;
  return undefined;
}

function readSettingsFile(filename: string): Partial<CiteSettings> {
  let raw: string;
  try {
    raw = fs.readFileSync(filename, 'utf8');
  } catch {
    // No settings file: defaults apply.
    return {};
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`Ignoring settings file '${filename}': ${reason}`);
    return {};
  }
  if (parsed === null || parsed === undefined) return {};

  const result = settingsFileSchema.safeParse(parsed);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    console.warn(`Ignoring settings file '${filename}': ${reason.join('; ')}`);
    return {};
  }
  return {
    ...(result.data.defaultStyle !== undefined ? { defaultStyle: result.data.defaultStyle } : {}),
    ...(result.data.quiet !== undefined ? { quiet: result.data.quiet } : {}),
  };
}

/**
 * Defaults, then the YAML settings file, then CITE_MD_STYLE / CITE_MD_QUIET.
 */
export function loadSettings(env: Env = process.env): CiteSettings {
  const fromFile = readSettingsFile(getSettingsPath(env));
  const envStyle = env.CITE_MD_STYLE?.trim();
  const envQuiet = parseFlag(env.CITE_MD_QUIET);

  return {
    defaultStyle: envStyle || fromFile.defaultStyle || DEFAULT_SETTINGS.defaultStyle,
    quiet: envQuiet ?? fromFile.quiet ?? DEFAULT_SETTINGS.quiet,
  };
}
