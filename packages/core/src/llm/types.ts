/**
 * LLM answer types for SQL generation.
 */

/** The JSON object the generator is asked to return. */
export interface GeneratedAnswer {
  /** Single SQL statement */
  sql: string;
  /** One or two sentences on how the query answers the request */
  explanation?: string;
  /** Assumptions the model made about the request */
  assumptions?: string[];
}

export interface ParsedAnswer {
  sql: string;
  explanation: string;
  assumptions: string[];
  /** True when the reply was a valid GeneratedAnswer object */
  structured: boolean;
}

/** A prompt split into its system and user parts. */
export interface PromptPair {
  system: string;
  prompt: string;
}
