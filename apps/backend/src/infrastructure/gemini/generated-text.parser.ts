import { isRecord } from './gemini.types';

export const NO_CONTENT_GENERATED = 'No content generated';
export const GENERATION_PARSE_FAILED = 'Failed to parse generated content';

export class GenerationParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = GenerationParseError.name;
  }
}

const optionalArray = (value: unknown, field: string): unknown[] => {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new GenerationParseError(`${field} is not an array`);
  }
  return value;
};

const optionalRecord = (
  value: unknown,
  field: string,
): Record<string, unknown> => {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new GenerationParseError(`${field} is not an object`);
  }
  return value;
};

/**
 * Concatenates the text parts of the first candidate in a generateContent
 * response. Throws GenerationParseError when the structure is not the one
 * the API documents.
 */
export function concatenateCandidateText(payload: unknown): string {
  const response = optionalRecord(payload, 'response');
  const candidates = optionalArray(response.candidates, 'candidates');
  if (candidates.length === 0) {
    return '';
  }

  const candidate = optionalRecord(candidates[0], 'candidates[0]');
  const content = optionalRecord(candidate.content, 'candidates[0].content');
  const parts = optionalArray(content.parts, 'candidates[0].content.parts');

  return parts
    .map((part, index) => {
      const text = optionalRecord(part, `parts[${index}]`).text;
      if (text === undefined || text === null) {
        return '';
      }
      if (typeof text !== 'string') {
        throw new GenerationParseError(`parts[${index}].text is not a string`);
      }
      return text;
    })
    .join('');
}
