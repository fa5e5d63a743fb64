import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { assembleScript, scriptItemFromPath, writeAssembledScript } from './script.js';

describe('scriptItemFromPath', () => {
  it('classifies by extension, case-insensitively', () => {
    expect(scriptItemFromPath('/scripts/Purge.SCR')).toEqual({ path: '/scripts/Purge.SCR', type: 'scr' });
    expect(scriptItemFromPath('/lisp/fix.lsp', 'FIXALL')).toEqual({ path: '/lisp/fix.lsp', type: 'lsp', invoke: 'FIXALL' });
  });

  it('rejects anything else', () => {
    expect(() => scriptItemFromPath('notes.txt')).toThrow('Unsupported script type ".txt" for notes.txt; expected .scr or .lsp');
    expect(() => scriptItemFromPath('README')).toThrow('Unsupported script type "(none)" for README; expected .scr or .lsp');
  });
});

describe('assembleScript', () => {
  let tmp: string;
  let scr: string;
  let lsp: string;

  beforeAll(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'dwgbatch-script-'));
    scr = path.join(tmp, 'cleanup.scr');
    lsp = path.join(tmp, 'fix.lsp');
    fs.writeFileSync(scr, 'ZOOM E\r\nAUDIT Y\r\n\r\n');
    fs.writeFileSync(lsp, '(defun c:FIXALL () (princ))');
  });

  afterAll(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('inlines scripts, loads LISP and appends QSAVE and QUIT', () => {
    const text = assembleScript(
      [
        { path: scr, type: 'scr' },
        { path: lsp, type: 'lsp', invoke: '  FIXALL  ' },
      ],
      { qsaveAtEnd: true, quitAtEnd: true }
    );

    expect(text).toBe(
      '; --- Assembled by dwgbatch ---\n' +
        'FILEDIA 0\n' +
        '; ---- INCLUDE SCRIPT: cleanup.scr ----\n' +
        'ZOOM E\nAUDIT Y\n' +
        '; ---- LOAD LISP: fix.lsp ----\n' +
        `(load "${lsp}")\n` +
        'FIXALL\n' +
        '\nQSAVE\n' +
        'QUIT\n'
    );
  });

  it('leaves out the invoke line and the trailer when not asked for', () => {
    const text = assembleScript([{ path: lsp, type: 'lsp' }], { qsaveAtEnd: false, quitAtEnd: false });
    expect(text.split('\n')).toEqual([
      '; --- Assembled by dwgbatch ---',
      'FILEDIA 0',
      '; ---- LOAD LISP: fix.lsp ----',
      `(load "${lsp}")`,
      '',
    ]);
  });

  it('doubles backslashes inside the load form', () => {
    const text = assembleScript([{ path: 'C:\\tools\\fix.lsp', type: 'lsp' }], { qsaveAtEnd: false, quitAtEnd: false });
    expect(text).toContain('(load "C:\\\\tools\\\\fix.lsp")\n');
  });

  it('records an unreadable script as a comment', () => {
    const missing = path.join(tmp, 'missing.scr');
    const text = assembleScript([{ path: missing, type: 'scr' }], { qsaveAtEnd: false, quitAtEnd: true });
    const lines = text.split('\n');
    expect(lines[3].startsWith(`; ERROR: failed to read script: ${missing} ; ENOENT`)).toBe(true);
    expect(lines.slice(4)).toEqual(['QUIT', '']);
  });

  it('writes one script per drawing named after it', () => {
    const out = path.join(tmp, 'out');
    const scriptPath = writeAssembledScript('Level 2', [{ path: scr, type: 'scr' }], out, {
      qsaveAtEnd: true,
      quitAtEnd: true,
    });

    expect(scriptPath).toBe(path.join(out, 'Level 2__batch.scr'));
    expect(fs.readFileSync(scriptPath, 'utf8')).toContain('ZOOM E\nAUDIT Y\n\nQSAVE\nQUIT\n');
  });
});
