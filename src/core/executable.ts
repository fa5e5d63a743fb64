import fs from 'node:fs';
import path from 'node:path';

export type Resolution = { ok: true; path: string } | { ok: false; reason: string };

function isExecutableFile(file: string): boolean {
  try {
    if (!fs.statSync(file).isFile()) return false;
    fs.accessSync(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function windowsExtensions(env: NodeJS.ProcessEnv): string[] {
  if (process.platform !== 'win32') return [''];
  const pathext = env.PATHEXT ?? '.COM;.EXE;.BAT;.CMD';
  return ['', ...pathext.split(';').filter(Boolean)];
}

/**
 * Synchronously locate the program a job will launch.
 *
 * A command containing a path separator is taken relative to `cwd`; a bare
 * name is looked up on PATH. Nothing is spawned here.
 */
export function resolveExecutable(command: string, cwd: string, env: NodeJS.ProcessEnv = process.env): Resolution {
  const exts = windowsExtensions(env);

  if (command.includes('/') || command.includes('\\') || path.isAbsolute(command)) {
    const full = path.resolve(cwd, command);
    for (const ext of exts) {
      if (isExecutableFile(full + ext)) return { ok: true, path: full + ext };
    }
    if (fs.existsSync(full)) return { ok: false, reason: `Executable is not runnable: ${command}` };
    return { ok: false, reason: `Executable not found: ${command}` };
  }

  const dirs = (env.PATH ?? env.Path ?? '').split(path.delimiter).filter(Boolean);
  for (const dir of dirs) {
    for (const ext of exts) {
      const candidate = path.join(dir, command + ext);
      if (isExecutableFile(candidate)) return { ok: true, path: candidate };
    }
  }
  return { ok: false, reason: `Executable not found on PATH: ${command}` };
}

export function checkWorkingDirectory(dir: string | undefined): string | null {
  if (dir === undefined) return null;
  try {
    if (fs.statSync(dir).isDirectory()) return null;
    return `Working directory is not a directory: ${dir}`;
  } catch {
    return `Working directory not found: ${dir}`;
  }
}
