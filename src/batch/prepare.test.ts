import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileLogSink } from '../core/log_sink.js';
import { consoleArgs, prepareJobs, uniqueDisplayNames, type PrepareSettings } from './prepare.js';
import type { ScriptItem } from './script.js';

describe('consoleArgs', () => {
  it('puts product and language before the drawing and script', () => {
    expect(consoleArgs({ product: 'ACAD', language: 'en-US' }, 'd.dwg', 's.scr')).toEqual([
      '/product', 'ACAD', '/l', 'en-US', '/i', 'd.dwg', '/s', 's.scr',
    ]);
  });

  it('omits empty switches', () => {
    expect(consoleArgs({ product: '', language: '' }, 'd.dwg', 's.scr')).toEqual(['/i', 'd.dwg', '/s', 's.scr']);
  });
});

describe('uniqueDisplayNames', () => {
  it('suffixes repeated basenames in order', () => {
    expect(uniqueDisplayNames(['/a/x.dwg', '/b/x.dwg', '/c/X.DWG', '/d/y.dwg'])).toEqual(['x', 'x-2', 'X-3', 'y']);
  });

  it('skips suffixes already used by another drawing', () => {
    expect(uniqueDisplayNames(['/a/x.dwg', '/b/x-2.dwg', '/c/x.dwg'])).toEqual(['x', 'x-2', 'x-3']);
  });
});

describe('prepareJobs', () => {
  let tmp: string;
  let dwg: string;
  let items: ScriptItem[];
  let settings: PrepareSettings;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'dwgbatch-prepare-'));
    fs.mkdirSync(path.join(tmp, 'src'));
    dwg = path.join(tmp, 'src', 'A-101.dwg');
    fs.writeFileSync(dwg, 'not really a drawing');
    const scr = path.join(tmp, 'purge.scr');
    fs.writeFileSync(scr, 'PURGE A * N\n');
    items = [{ path: scr, type: 'scr' }];
    settings = {
      accore_path: '/opt/acad/accoreconsole',
      language: 'en-US',
      product: '',
      qsave_at_end: true,
      quit_at_end: true,
      copy_to_output: false,
      enable_logging: true,
      output_dir: path.join(tmp, 'out'),
    };
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('validates its inputs', () => {
    expect(() => prepareJobs([], items, settings)).toThrow('Add at least one DWG.');
    expect(() => prepareJobs([dwg], [], settings)).toThrow('Add at least one script or LISP.');
    const missing = path.join(tmp, 'nope.dwg');
    expect(() => prepareJobs([dwg, missing], items, settings)).toThrow(`DWG file not found: ${missing}`);
  });

  it('builds one console invocation per drawing', () => {
    const [job] = prepareJobs([dwg], items, settings);
    const out = path.join(tmp, 'out');

    expect(job.drawing).toBe(dwg);
    expect(job.scriptPath).toBe(path.join(out, 'A-101__batch.scr'));
    expect(job.logPath).toBe(path.join(out, 'A-101__accore.log'));
    expect(job.spec).toMatchObject({
      displayName: 'A-101',
      command: '/opt/acad/accoreconsole',
      args: ['/l', 'en-US', '/i', dwg, '/s', job.scriptPath],
    });
    expect(job.spec.logSink).toBeInstanceOf(FileLogSink);
    expect(fs.readFileSync(job.scriptPath, 'utf8')).toContain('PURGE A * N\n');
  });

  it('copies drawings into the output directory when asked to', () => {
    const [job] = prepareJobs([dwg], items, { ...settings, copy_to_output: true, enable_logging: false });
    const copy = path.join(tmp, 'out', 'A-101.dwg');

    expect(job.drawing).toBe(copy);
    expect(fs.readFileSync(copy, 'utf8')).toBe('not really a drawing');
    expect(job.spec.args).toContain(copy);
    expect(job.logPath).toBeNull();
    expect(job.spec.logSink).toBeUndefined();
  });

  it('keeps drawings with the same basename apart', () => {
    fs.mkdirSync(path.join(tmp, 'b'));
    const other = path.join(tmp, 'b', 'A-101.dwg');
    fs.writeFileSync(other, 'another drawing');
    const out = path.join(tmp, 'out');

    const jobs = prepareJobs([dwg, other], items, { ...settings, copy_to_output: true });

    expect(jobs.map((j) => j.spec.displayName)).toEqual(['A-101', 'A-101-2']);
    expect(jobs.map((j) => j.drawing)).toEqual([path.join(out, 'A-101.dwg'), path.join(out, 'A-101-2.dwg')]);
    expect(jobs.map((j) => fs.readFileSync(j.drawing, 'utf8'))).toEqual(['not really a drawing', 'another drawing']);
    expect(jobs.map((j) => j.scriptPath)).toEqual([
      path.join(out, 'A-101__batch.scr'),
      path.join(out, 'A-101-2__batch.scr'),
    ]);
    expect(jobs.map((j) => j.logPath)).toEqual([path.join(out, 'A-101__accore.log'), path.join(out, 'A-101-2__accore.log')]);
  });
});
