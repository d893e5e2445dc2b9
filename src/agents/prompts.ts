import type { AgentDefinition } from "../config/schema.js";

export function buildPersonaPrompt(agent: AgentDefinition, hasTools: boolean): string {
  const lines = [
    `You are ${agent.role}. ${agent.backstory}`,
    `Your personal goal is: ${agent.goal}`,
  ];
  if (hasTools) {
    lines.push(
      "",
      "Use the tools you have been given to gather what you need. Only call tools from your function declarations.",
      "Never make up data you have not retrieved with a tool.",
      "When you have everything you need, reply with your final answer as plain text without calling a tool."
    );
  } else {
    lines.push("", "Reply with your final answer as plain text.");
  }
  return lines.join("\n");
}

export function buildTaskPrompt(opts: {
  description: string;
  expectedOutput: string;
  context?: string;
}): string {
  const parts = [
    `Current Task: ${opts.description}`,
    "",
    `This is the expected criteria for your final answer: ${opts.expectedOutput}`,
    "You MUST return the actual complete content as the final answer, not a summary.",
  ];
  if (opts.context) {
    parts.push("", "This is the context you're working with:", opts.context);
  }
  return parts.join("\n");
}

export function buildCoworkerPrompt(question: string, context?: string): string {
  return context
    ? `${question}\n\nThis is the context you're working with:\n${context}`
    : question;
}

/**
 * Fill `{name}` placeholders from the kickoff inputs; unknown placeholders
 * are left as they are.
 */
export function interpolate(template: string, inputs: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(inputs, key) ? inputs[key] : match
  );
}
