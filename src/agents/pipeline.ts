// The fixed extract → analyze → report pipeline. Each stage reads the
// previous stage's output as context.

export type StageId = "extract" | "analyze" | "report";

export interface TaskDefinition {
  id: StageId;
  agent: string;
  description: string;
  expectedOutput: string;
  contextFrom?: StageId;
}

export const PIPELINE_TASKS: readonly TaskDefinition[] = [
  {
    id: "extract",
    agent: "sql_dev",
    description: "Extract the data required to answer the question: {query}.",
    expectedOutput: "A list of data from the database that answers the question.",
  },
  {
    id: "analyze",
    agent: "data_analyst",
    description: "Analyze the data provided and write a brief analysis for the question: {query}.",
    expectedOutput: "A short, easy-to-understand text analyzing the provided data.",
    contextFrom: "extract",
  },
  {
    id: "report",
    agent: "report_writer",
    description:
      "Write an executive summary of the report from the analysis. The report must be less than 50 words and presented in markdown.",
    expectedOutput: "A markdown report summarizing the analysis.",
    contextFrom: "analyze",
  },
];

export const PIPELINE_AGENTS = [...new Set(PIPELINE_TASKS.map((t) => t.agent))];
