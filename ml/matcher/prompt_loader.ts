import fs from "node:fs";
import path from "node:path";

import { configurationError } from "./errors";

export type PromptVariables = {
  symptom: string;
  details: string;
  context: string;
};

const PLACEHOLDER = /\{\{(symptom|details|context)\}\}/g;

export function loadPromptTemplate(promptPath: string): string {
  const file = path.resolve(process.cwd(), promptPath);
  if (!fs.existsSync(file)) {
    throw configurationError(`Prompt template missing at ${file}`);
  }
  return fs.readFileSync(file, "utf8");
}

/**
 * Fills every placeholder in one pass, so values that contain placeholder
 * text are inserted verbatim.
 */
export function renderPrompt(template: string, variables: PromptVariables): string {
  const values: Record<string, string> = { ...variables };
  return template.replace(PLACEHOLDER, (match: string, key: string) => values[key] ?? match);
}
