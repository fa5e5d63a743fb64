import fs from 'node:fs';
import path from 'node:path';
import { ValidationError, errorMessage } from '../core/errors.js';

export const EXT_DWG = '.dwg';
export const EXT_SCR = '.scr';
export const EXT_LSP = '.lsp';
export const BATCH_SCRIPT_SUFFIX = '__batch.scr';

export type ScriptType = 'scr' | 'lsp';

export interface ScriptItem {
  path: string;
  type: ScriptType;
  /** LISP only: command or form to run after loading, e.g. `MYCMD` or `(c:MYCMD)`. */
  invoke?: string;
}

export interface AssembleOptions {
  qsaveAtEnd: boolean;
  quitAtEnd: boolean;
}

export function scriptItemFromPath(file: string, invoke?: string): ScriptItem {
  const ext = path.extname(file).toLowerCase();
  if (ext === EXT_SCR) return { path: file, type: 'scr' };
  if (ext === EXT_LSP) return { path: file, type: 'lsp', invoke };
  throw new ValidationError(`Unsupported script type "${ext || '(none)'}" for ${file}; expected .scr or .lsp`);
}

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

function readScr(file: string): string {
  return normalizeNewlines(fs.readFileSync(file, 'utf8')).trimEnd() + '\n';
}

/**
 * Build the text of one script the console runs against a drawing:
 * .scr contents inlined, .lsp files loaded (and optionally invoked),
 * then QSAVE / QUIT when asked for.
 */
export function assembleScript(items: readonly ScriptItem[], opts: AssembleOptions): string {
  const lines: string[] = ['; --- Assembled by dwgbatch ---\n', 'FILEDIA 0\n'];

  for (const it of items) {
    const base = path.basename(it.path);
    if (it.type === 'scr') {
      lines.push(`; ---- INCLUDE SCRIPT: ${base} ----\n`);
      try {
        lines.push(readScr(it.path));
      } catch (err) {
        lines.push(`; ERROR: failed to read script: ${it.path} ; ${errorMessage(err)}\n`);
      }
    } else {
      lines.push(`; ---- LOAD LISP: ${base} ----\n`);
      // backslashes must be doubled inside a LISP string
      lines.push(`(load "${it.path.replace(/\\/g, '\\\\')}")\n`);
      const invoke = it.invoke?.trim();
      if (invoke) lines.push(`${invoke}\n`);
    }
  }

  if (opts.qsaveAtEnd) lines.push('\nQSAVE\n');
  if (opts.quitAtEnd) lines.push('QUIT\n');
  return lines.join('');
}

export function writeAssembledScript(
  displayName: string,
  items: readonly ScriptItem[],
  outputDir: string,
  opts: AssembleOptions
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const scriptPath = path.join(outputDir, displayName + BATCH_SCRIPT_SUFFIX);
  fs.writeFileSync(scriptPath, assembleScript(items, opts), 'utf8');
  return scriptPath;
}
