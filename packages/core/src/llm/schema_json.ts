/**
 * AJV JSON Schema for validating a GeneratedAnswer from the LLM.
 * Using plain object schema (not JSONSchemaType) to avoid optional-field typing issues.
 */

export const generatedAnswerSchema = {
  type: 'object' as const,
  properties: {
    sql: { type: 'string' as const, minLength: 1 },
    explanation: { type: 'string' as const },
    assumptions: {
      type: 'array' as const,
      items: { type: 'string' as const },
    },
  },
  required: ['sql'] as const,
};
