/**
 * Prompt construction for LLM SQL generation.
 */

export interface ChatMessage {
  role: 'system';
  content: string;
}

const PREAMBLE = 'You are an SQL assistant. Below is the schema of the SQLite database:';

const FORMAT_INSTRUCTIONS =
  'Convert the following natural language request into a valid SQL query that can be executed ' +
  'on the above database. Do not include any Markdown formatting or code blocks in your response. ' +
  'Provide only the plain SQL query.';

/**
 * Pure: identical schema text and request always give the identical prompt.
 * The schema is embedded as-is; size capping happens at serialization time.
 */
export function buildPrompt(schemaText: string, userRequest: string): string {
  return `${PREAMBLE}

${schemaText}

${FORMAT_INSTRUCTIONS}

User request: ${userRequest}
SQL Query:`;
}

/** The whole prompt travels as a single instruction-role message. */
export function buildMessages(prompt: string): ChatMessage[] {
  return [{ role: 'system', content: prompt }];
}
