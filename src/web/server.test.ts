/**
 * Web Tests
 * Form handling, report rendering and failure pages over a live local server
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "fs";
import { join } from "path";
import type { Express } from "express";
import { createApp, startServer, type ReportRunner } from "./server.js";
import { createCrew, type CrewOutput } from "../agents/crew.js";
import { loadCsvIntoStore } from "../data/loader.js";
import { FinanceStore } from "../store/finance-store.js";
import { ScriptedProvider, makeCrewConfig, makeTempDir, toolCall, type TempDir } from "../testing/fakes.js";

async function request(app: Express, path: string, init?: RequestInit) {
  const server = await startServer(app, 0);
  try {
    const address = server.address();
    const port = address && typeof address === "object" ? address.port : 0;
    const res = await fetch(`http://127.0.0.1:${port}${path}`, init);
    return { status: res.status, contentType: res.headers.get("content-type"), text: await res.text() };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

function postQuestion(app: Express, query?: string) {
  const form = new URLSearchParams();
  if (query !== undefined) form.set("query", query);
  return request(app, "/", {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: form.toString(),
  });
}

function fixedReport(report: string): ReportRunner {
  return {
    kickoff: vi.fn(async (): Promise<CrewOutput> => ({
      runId: "run-test",
      report,
      tasks: [],
      usage: { inputTokens: 0, outputTokens: 0 },
      durationMs: 1,
    })),
  };
}

describe("Web app", () => {
  it("should serve the question form", async () => {
    const res = await request(createApp({ crew: fixedReport("") }), "/");

    expect(res.status).toBe(200);
    expect(res.contentType).toContain("text/html");
    expect(res.text).toContain('<form method="post" action="/">');
    expect(res.text).toContain('name="query"');
  });

  it("should answer health checks", async () => {
    const res = await request(createApp({ crew: fixedReport("") }), "/health");

    expect(res.status).toBe(200);
    expect(JSON.parse(res.text)).toEqual({ status: "ok" });
  });

  it("should reject an empty question without running the crew", async () => {
    const crew = fixedReport("unused");
    const res = await postQuestion(createApp({ crew }), "   ");

    expect(res.status).toBe(400);
    expect(res.text).toContain('<p class="error" role="alert">Please enter a question.</p>');
    expect(crew.kickoff).not.toHaveBeenCalled();
  });

  it("should reject a missing question field", async () => {
    const res = await postQuestion(createApp({ crew: fixedReport("unused") }));

    expect(res.status).toBe(400);
    expect(res.text).toContain("Please enter a question.");
  });

  it("should reject questions that are too long", async () => {
    const res = await postQuestion(createApp({ crew: fixedReport("unused") }), "a".repeat(2001));

    expect(res.status).toBe(400);
    expect(res.text).toContain("Questions are limited to 2000 characters.");
  });

  it("should show a generic failure page when the crew fails", async () => {
    const crew: ReportRunner = {
      kickoff: vi.fn(async (): Promise<CrewOutput> => {
        throw new Error("model unavailable: test-secret");
      }),
    };
    const res = await postQuestion(createApp({ crew }), "What was the total revenue?");

    expect(res.status).toBe(500);
    expect(res.text).toContain("<h1>Something went wrong</h1>");
    expect(res.text).not.toContain("test-secret");
  });

  it("should render raw HTML in the report as text", async () => {
    const res = await postQuestion(
      createApp({ crew: fixedReport("<script>alert(1)</script>\n\n**Done**") }),
      "Anything unusual?"
    );

    expect(res.status).toBe(200);
    expect(res.text).toContain("&lt;script&gt;alert(1)&lt;/script&gt;");
    expect(res.text).not.toContain("<script>");
    expect(res.text).toContain("<strong>Done</strong>");
  });

  it("should escape the question on the result page", async () => {
    const res = await postQuestion(createApp({ crew: fixedReport("ok") }), "<b>Revenue?</b>");
    expect(res.text).toContain('<p class="question">&lt;b&gt;Revenue?&lt;/b&gt;</p>');
  });
});

describe("Web app end to end", () => {
  let tmp: TempDir;
  let store: FinanceStore;

  beforeEach(async () => {
    tmp = makeTempDir();
    const csvPath = join(tmp.path, "Financial Statements.csv");
    const dbPath = join(tmp.path, "finance.db");
    writeFileSync(csvPath, "Year,Company,Revenue\n2021,Acme,1000\n2022,Acme,2500\n2023,Globex,1500\n");
    await loadCsvIntoStore({ csvPath, dbPath });
    store = new FinanceStore(dbPath);
  });

  afterEach(() => {
    store.close();
    tmp.cleanup();
  });

  it("should answer a revenue question with the summed total", async () => {
    // The SQL stage echoes whatever the real query returned
    const provider = new ScriptedProvider([
      {
        toolCalls: [
          toolCall("execute_sql", {
            sql_query: "SELECT SUM(Revenue) AS total_revenue FROM Financial_Statements",
          }),
        ],
      },
      (opts) => {
        const last = opts.messages.at(-1);
        return { text: last?.role === "tool" ? last.content : "no data" };
      },
      (opts) => {
        const total = opts.messages[0].content.split("\n").at(-1);
        return { text: `The total revenue is ${total}.` };
      },
      (opts) => {
        const total = opts.messages[0].content.match(/total revenue is (\d+)/)?.[1];
        return { text: `Total revenue: **${total}**` };
      },
    ]);
    const crew = createCrew({ config: makeCrewConfig(), provider, store });

    const res = await postQuestion(createApp({ crew }), "What was the total revenue?");

    expect(res.status).toBe(200);
    expect(res.text).toContain("<p>Total revenue: <strong>5000</strong></p>");
    expect(res.text).toContain('<p class="question">What was the total revenue?</p>');
  });
});
