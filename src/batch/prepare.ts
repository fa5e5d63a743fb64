import fs from 'node:fs';
import path from 'node:path';
import type { Settings } from '../config/settings.js';
import { ValidationError } from '../core/errors.js';
import { FileLogSink } from '../core/log_sink.js';
import type { JobSpec } from '../core/types.js';
import { writeAssembledScript, type ScriptItem } from './script.js';

export const ACCORE_LOG_SUFFIX = '__accore.log';

export type PrepareSettings = Pick<
  Settings,
  'accore_path' | 'language' | 'product' | 'qsave_at_end' | 'quit_at_end' | 'copy_to_output' | 'enable_logging' | 'output_dir'
>;

export interface PreparedJob {
  spec: JobSpec;
  drawing: string;
  scriptPath: string;
  logPath: string | null;
}

export function consoleArgs(settings: Pick<Settings, 'product' | 'language'>, drawing: string, script: string): string[] {
  const args: string[] = [];
  if (settings.product) args.push('/product', settings.product);
  if (settings.language) args.push('/l', settings.language);
  args.push('/i', drawing, '/s', script);
  return args;
}

/**
 * Display names double as file stems in the output directory, so drawings
 * sharing a basename get `-2`, `-3`, ... suffixes in submission order.
 * Compared case-insensitively, as Windows file names are.
 */
export function uniqueDisplayNames(drawings: readonly string[]): string[] {
  const taken = new Set<string>();
  const names = uniqueDisplayNames(drawings);

  return drawings.map((dwg, i) => {
    const displayName = names[i];
    let drawing = path.resolve(dwg);
    if (settings.copy_to_output) {
      const target = path.join(outputDir, displayName + path.extname(drawing));
      if (target !== drawing) fs.copyFileSync(drawing, target);
      drawing = target;
    }

    const scriptPath = writeAssembledScript(displayName, items, outputDir, {
      qsaveAtEnd: settings.qsave_at_end,
      quitAtEnd: settings.quit_at_end,
    });
    const logPath = settings.enable_logging ? logPathFor(outputDir, displayName) : null;

    return {
      drawing,
      scriptPath,
      logPath,
      spec: {
        displayName,
        command: settings.accore_path,
        args: consoleArgs(settings, drawing, scriptPath),
        logSink: logPath ? new FileLogSink(logPath) : undefined,
      },
    };
  });
}
