import express, { Request, Response } from 'express';
import { listRuns, listRunsByBatch, summary, type RunRow } from '../db/repo.js';

export const DEFAULT_PORT = 3000;

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function html(title: string, body: string) {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${escapeHtml(title)}</title>
  <style>
    :root { --bg: #0d0d10; --card: #1b1b1f; --text: #e8e8e8; --border: #2a2a2d;
            --accent: #007bff; --success: #4caf50; --fail: #f44336; --warn: #ff9800; }
    body { margin: 0; font-family: 'Segoe UI', Roboto, sans-serif; background: var(--bg); color: var(--text); }
    header { padding: 15px 25px; border-bottom: 1px solid var(--border); display: flex; justify-content: space-between; }
    header h1 { margin: 0; font-size: 1.4rem; color: var(--accent); }
    header a { color: var(--text); text-decoration: none; }
    main { padding: 20px 30px; }
    table { width: 100%; border-collapse: collapse; background: var(--card); margin-top: 10px; }
    th, td { padding: 8px 12px; border-bottom: 1px solid var(--border); font-size: 0.9rem; text-align: left; }
    a.run { color: var(--accent); }
    .badge { padding: 3px 8px; border-radius: 5px; font-size: 0.75rem; font-weight: 600; text-transform: uppercase; }
    .badge.ok { background: var(--success); color: #000; }
    .badge.failed { background: var(--fail); }
    .badge.killed, .badge.cancelled { background: var(--warn); color: #000; }
    .stats { display: flex; gap: 40px; background: var(--card); padding: 15px; border: 1px solid var(--border); }
    .stats span { display: block; font-size: 1.4rem; margin-top: 4px; }
  </style>
</head>
<body>
  <header><h1>DWG Batch Runs</h1><nav><a href="/runs">Runs</a></nav></header>
  <main>${body}</main>
</body>
</html>`;
}

function badge(r: RunRow): string {
  if (r.succeeded) return `<span class="badge ok">ok</span>`;
  const cls = r.exit_code === 'killed' || r.exit_code === 'cancelled' ? r.exit_code : 'failed';
  return `<span class="badge ${cls}">${escapeHtml(r.exit_code)}</span>`;
}

export function renderRunsTable(rows: readonly RunRow[]): string {
  if (rows.length === 0) return `<p><i>No recorded jobs</i></p>`;
  const body = rows
    .map(
      (r) => `<tr>
        <td><a class="run" href="/runs/${encodeURIComponent(r.run_id)}">${escapeHtml(r.run_id)}</a></td>
        <td>${escapeHtml(r.display_name)}</td>
        <td>${badge(r)}</td>
        <td>${escapeHtml(r.started_at ?? '')}</td>
        <td>${escapeHtml(r.finished_at)}</td>
        <td>${escapeHtml((r.error ?? '').slice(0, 80))}</td>
        <td>${escapeHtml(r.log_path ?? '')}</td>
      </tr>`
    )
    .join('');
  return `<table><tr><th>Run</th><th>DWG</th><th>Exit</th><th>Started</th><th>Finished</th><th>Error</th><th>Log file</th></tr>${body}</table>`;
}

export function createApp() {
  const app = express();

  app.get('/', (_req: Request, res: Response) => res.redirect('/runs'));

  app.get('/runs', (_req: Request, res: Response) => {
    const s = summary();
    const stats = `<div class="stats">
      <div>JOBS<span>${s.total}</span></div>
      <div>SUCCEEDED<span>${s.succeeded}</span></div>
      <div>FAILED<span>${s.failed}</span></div>
      <div>RUNS<span>${s.runs}</span></div>
    </div>`;
    res.send(html('DWG Batch Runs', stats + renderRunsTable(listRuns(200))));
  });

  app.get('/runs/:id', (req: Request, res: Response) => {
    const rows = listRunsByBatch(req.params.id);
    if (rows.length === 0) {
      res.status(404).send(html('Not found', `<p>No run ${escapeHtml(req.params.id)}</p>`));
      return;
    }
    res.send(html(`Run ${req.params.id}`, `<h2>${escapeHtml(req.params.id)}</h2>${renderRunsTable(rows)}`));
  });

  return app;
}

export function startDashboard(port = DEFAULT_PORT) {
  return createApp().listen(port, () => {
    console.log(`🚀 Batch dashboard running at http://localhost:${port}`);
  });
}
