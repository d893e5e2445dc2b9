/**
 * HTML pages for the question form and the report.
 */

import { escapeHtml } from "./markdown.js";

export const MAX_QUERY_LENGTH = 2000;

export interface FormPageOptions {
  query?: string;
  error?: string;
}

export interface ResultPageOptions {
  query: string;
  reportHtml: string;
  runId?: string;
}

export function renderFormPage(opts: FormPageOptions = {}): string {
  const error = opts.error
    ? `<p class="error" role="alert">${escapeHtml(opts.error)}</p>`
    : "";
  return layout(
    "Financial Analysis",
    `<h1>Financial Analysis</h1>
    <p class="lead">Ask a question about the financial statements.</p>
    ${error}
    <form method="post" action="/">
      <label for="query">Question</label>
      <textarea id="query" name="query" rows="3" maxlength="${MAX_QUERY_LENGTH}" required>${escapeHtml(opts.query ?? "")}</textarea>
      <button type="submit">Analyze</button>
    </form>`
  );
}

export function renderResultPage(opts: ResultPageOptions): string {
  const runId = opts.runId ? `<p class="meta">Run ${escapeHtml(opts.runId)}</p>` : "";
  return layout(
    "Report",
    `<h1>Report</h1>
    <p class="question">${escapeHtml(opts.query)}</p>
    <article class="report">
${opts.reportHtml}
    </article>
    ${runId}
    <p><a href="/">Ask another question</a></p>`
  );
}

export function renderErrorPage(): string {
  return layout(
    "Something went wrong",
    `<h1>Something went wrong</h1>
    <p>The analysis could not be completed. Please try again in a moment.</p>
    <p><a href="/">Back to the form</a></p>`
  );
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>
    :root {
      --bg: #f7f7f5;
      --card: #ffffff;
      --accent: #1f6f5c;
      --error: #b42318;
      --text: #1d1d1b;
      --muted: #6b6b66;
      --border: #deded8;
    }

    body {
      margin: 0;
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif;
      background: var(--bg);
      color: var(--text);
    }

    main {
      max-width: 720px;
      margin: 48px auto;
      padding: 32px;
      background: var(--card);
      border: 1px solid var(--border);
      border-radius: 8px;
    }

    textarea {
      display: block;
      width: 100%;
      margin: 8px 0 16px;
      padding: 8px;
      font: inherit;
      box-sizing: border-box;
    }

    button {
      padding: 8px 20px;
      background: var(--accent);
      color: #fff;
      border: none;
      border-radius: 4px;
      cursor: pointer;
    }

    .lead, .meta, .question { color: var(--muted); }
    .error { color: var(--error); font-weight: 600; }
    .report { line-height: 1.6; }
  </style>
</head>
<body>
  <main>
    ${body}
  </main>
</body>
</html>`;
}
