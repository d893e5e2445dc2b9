import express from "express";
import type { Server } from "http";
import { z } from "zod";
import type { CrewInputs, CrewOutput } from "../agents/crew.js";
import { renderMarkdown } from "./markdown.js";
import { MAX_QUERY_LENGTH, renderErrorPage, renderFormPage, renderResultPage } from "./pages.js";
import { createLogger } from "../infra/logger.js";

const log = createLogger("web");

export interface ReportRunner {
  kickoff(inputs: CrewInputs): Promise<CrewOutput>;
}

export interface WebDeps {
  crew: ReportRunner;
}

const questionForm = z.object({
  query: z
    .string({
      required_error: "Please enter a question.",
      invalid_type_error: "Please enter a single question.",
    })
    .trim()
    .min(1, "Please enter a question.")
    .max(MAX_QUERY_LENGTH, `Questions are limited to ${MAX_QUERY_LENGTH} characters.`),
});

export function createApp(deps: WebDeps): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.urlencoded({ extended: false, limit: "64kb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/", (_req, res) => {
    res.type("html").send(renderFormPage());
  });

  app.post("/", async (req, res) => {
    const parsed = questionForm.safeParse(req.body ?? {});
    if (!parsed.success) {
      const raw: unknown = req.body?.query;
      res
        .status(400)
        .type("html")
        .send(
          renderFormPage({
            query: typeof raw === "string" ? raw : "",
            error: parsed.error.issues[0]?.message ?? "Please enter a question.",
          })
        );
      return;
    }

    const { query } = parsed.data;
    try {
      const result = await deps.crew.kickoff({ query });
      res
        .type("html")
        .send(
          renderResultPage({ query, reportHtml: renderMarkdown(result.report), runId: result.runId })
        );
    } catch (err) {
      log.error({ err }, "Analysis failed");
      res.status(500).type("html").send(renderErrorPage());
    }
  });

  return app;
}

export function startServer(app: express.Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once("listening", () => {
      const address = server.address();
      const actualPort = address && typeof address === "object" ? address.port : port;
      log.info("Listening on http://localhost:%d", actualPort);
      resolve(server);
    });
    server.once("error", reject);
  });
}
