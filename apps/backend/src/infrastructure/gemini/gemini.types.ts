/**
 * Wire shapes for the parts of the Gemini REST API this service calls.
 * Response bodies are read as `unknown` and narrowed field by field.
 */

export type FileState = 'STATE_UNSPECIFIED' | 'PROCESSING' | 'ACTIVE' | 'FAILED';

export interface LocalMediaFile {
  path: string;
  displayName: string;
  mimeType: string;
  sizeBytes: number;
}

export interface RemoteFileHandle {
  uri: string;
  /** Final path segment of `uri`, used to address the file-status endpoint. */
  name: string;
  mimeType: string;
  state: FileState;
}

export interface StartUploadRequestBody {
  file: { display_name: string };
}

export type GenerationPart =
  | { file_data: { mime_type: string; file_uri: string } }
  | { text: string };

export interface GenerateContentRequestBody {
  contents: Array<{ parts: GenerationPart[] }>;
}

export const UPLOAD_URL_HEADER = 'x-goog-upload-url';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const fileNameFromUri = (uri: string): string => {
  const segments = uri.split('/');
  return segments[segments.length - 1];
};
