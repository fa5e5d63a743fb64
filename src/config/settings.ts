import path from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { DEFAULT_PARALLEL, MAX_PARALLEL, MIN_PARALLEL } from '../core/scheduler.js';

const TRUE_WORDS = ['true', '1', 'yes', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'off'];

// config rows are stored as text, so booleans arrive as words
const booleanish = z.preprocess((v) => {
  if (typeof v !== 'string') return v;
  const word = v.trim().toLowerCase();
  if (TRUE_WORDS.includes(word)) return true;
  if (FALSE_WORDS.includes(word)) return false;
  return v;
}, z.boolean());

export function defaultAccorePath(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32'
    ? 'C:\\Program Files\\Autodesk\\AutoCAD 2024\\accoreconsole.exe'
    : 'accoreconsole';
}

export const SettingsSchema = z.object({
  accore_path: z.string().min(1).default(() => defaultAccorePath()),
  language: z.string().default('en-US'),
  product: z.string().default(''),
  max_parallel: z.coerce.number().int().min(MIN_PARALLEL).max(MAX_PARALLEL).default(DEFAULT_PARALLEL),
  qsave_at_end: booleanish.default(true),
  quit_at_end: booleanish.default(true),
  copy_to_output: booleanish.default(false),
  enable_logging: booleanish.default(true),
  output_dir: z.string().min(1).default(() => path.resolve(process.cwd(), 'output')),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const SETTING_KEYS = Object.keys(SettingsSchema.shape);

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'value'}: ${i.message}`).join('; ');
}

/** Merge stored values over the defaults. Unknown keys are ignored. */
export function parseSettings(raw: Record<string, unknown>): Settings {
  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid settings: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function validateSetting(key: string, value: string) {
  if (!SETTING_KEYS.includes(key)) {
    throw new ValidationError(`Unknown setting "${key}". Known settings: ${SETTING_KEYS.join(', ')}`);
  }
  const parsed = SettingsSchema.partial().safeParse({ [key]: value });
  if (!parsed.success) {
    throw new ValidationError(`Invalid value for ${key}: ${describeIssues(parsed.error)}`);
  }
}
