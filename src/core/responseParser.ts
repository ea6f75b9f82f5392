/**
 * Structured Reply Parser
 *
 * Models are asked to answer in four labelled lines. They rarely comply
 * exactly, so parsing is line-oriented and forgiving: fields may appear in
 * any order, be missing, or be surrounded by other text.
 */

/**
 * A parsed model answer
 */
export interface LLMResponse {
  explanation: string;
  recommendedCommand?: string;
  warnings?: string;
  additionalInfo?: string;
}

export const FALLBACK_EXPLANATION = 'Unable to parse explanation from response.';

/** Marks an optional field as empty in the structured reply. */
export const NONE = 'NONE';

const FIELD_PREFIXES = [
  ['EXPLANATION: ', 'explanation'],
  ['COMMAND: ', 'recommendedCommand'],
  ['WARNINGS: ', 'warnings'],
  ['INFO: ', 'additionalInfo'],
] as const satisfies ReadonlyArray<readonly [string, keyof LLMResponse]>;

/**
 * Extracts an LLMResponse from raw model output. Never throws.
 * A repeated field keeps its last value.
 */
export function parseStructuredResponse(raw: string): LLMResponse {
  const fields: Partial<Record<keyof LLMResponse, string>> = {};

  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const match = FIELD_PREFIXES.find(([prefix]) => trimmed.startsWith(prefix));
    if (!match) continue;

    const [prefix, field] = match;
    const value = trimmed.slice(prefix.length);
    if (field !== 'explanation' && value === NONE) {
      delete fields[field];
    } else {
      fields[field] = value;
    }
  }

  const response: LLMResponse = { explanation: fields.explanation ?? FALLBACK_EXPLANATION };
  if (fields.recommendedCommand !== undefined) response.recommendedCommand = fields.recommendedCommand;
  if (fields.warnings !== undefined) response.warnings = fields.warnings;
  if (fields.additionalInfo !== undefined) response.additionalInfo = fields.additionalInfo;
  return response;
}

/**
 * Renders a response in the structured reply format, NONE for absent fields
 */
export function formatStructuredReply(response: LLMResponse): string {
  return [
    `EXPLANATION: ${response.explanation}`,
    `COMMAND: ${response.recommendedCommand ?? NONE}`,
    `WARNINGS: ${response.warnings ?? NONE}`,
    `INFO: ${response.additionalInfo ?? NONE}`,
  ].join('\n');
}
