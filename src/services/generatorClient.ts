import { BATCH_ARCHIVE_NAME } from '../constants';
import type {
  ApiErrorBody,
  BatchFailure,
  DocumentFormat,
  NameStanzasResponse,
  NamesPreview,
} from '../types';
import { parseContentDispositionFileName } from '../utils/documentFileName';

// Browser side of the API in server.ts

export class ApiRequestError extends Error {
  readonly code: string;
  readonly messageHe?: string;

  constructor(code: string, message: string, messageHe?: string) {
    super(message);
    this.name = 'ApiRequestError';
    this.code = code;
    this.messageHe = messageHe;
  }
}

export interface DownloadedFile {
  blob: Blob;
  fileName: string;
}

export interface BatchDownload extends DownloadedFile {
  succeeded: number;
  failed: number;
  failures: BatchFailure[];
}

const isApiErrorBody = (value: unknown): value is ApiErrorBody =>
  typeof value === 'object' &&
  value !== null &&
  'error' in value &&
  typeof value.error === 'object' &&
  value.error !== null &&
  'code' in value.error &&
  typeof value.error.code === 'string';

const toApiError = async (response: Response): Promise<ApiRequestError> => {
  const data: unknown = await response.json().catch(() => null);
  if (isApiErrorBody(data)) {
    return new ApiRequestError(data.error.code, data.error.message, data.error.messageHe);
  }
  return new ApiRequestError('HTTP_ERROR', `Server error: ${response.status} ${response.statusText}`);
};

const postJson = (url: string, body: unknown): Promise<Response> =>
  fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });

export const fileToBase64 = (file: File): Promise<string> =>
  new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => {
      const result = typeof reader.result === 'string' ? reader.result : '';
      resolve(result.replace(/^data:[^,]*,/, ''));
    };
    reader.onerror = () => reject(reader.error ?? new Error('Could not read file'));
    reader.readAsDataURL(file);
  });

const isBatchFailure = (value: unknown): value is BatchFailure =>
  typeof value === 'object' &&
  value !== null &&
  'name' in value &&
  typeof value.name === 'string' &&
  'reason' in value &&
  typeof value.reason === 'string';

export const parseBatchFailuresHeader = (header: string | null): BatchFailure[] => {
  if (!header) return [];
  try {
    const parsed: unknown = JSON.parse(decodeURIComponent(header));
    return Array.isArray(parsed) ? parsed.filter(isBatchFailure) : [];
  } catch (error) {
    console.error('Could not parse batch failures header', error);
    return [];
  }
};

export const generatorClient = {
  async getNameStanzas(name: string): Promise<NameStanzasResponse> {
    const response = await fetch(`/api/name-stanzas?name=${encodeURIComponent(name)}`);
    if (!response.ok) throw await toApiError(response);
    return response.json();
  },

  async downloadNameDocument(name: string, format: DocumentFormat): Promise<DownloadedFile> {
    const response = await postJson('/api/render-name-document', { name, format });
    if (!response.ok) throw await toApiError(response);
    return {
      blob: await response.blob(),
      fileName:
        parseContentDispositionFileName(response.headers.get('Content-Disposition')) ??
        `Tehillim119.${format}`,
    };
  },

  async previewNames(file: File): Promise<NamesPreview> {
    const response = await postJson('/api/names-preview', { file: await fileToBase64(file) });
    if (!response.ok) throw await toApiError(response);
    return response.json();
  },

  async downloadBatch(file: File, format: DocumentFormat): Promise<BatchDownload> {
    const response = await postJson('/api/render-batch', { file: await fileToBase64(file), format });
    if (!response.ok) throw await toApiError(response);
    return {
      blob: await response.blob(),
      fileName:
        parseContentDispositionFileName(response.headers.get('Content-Disposition')) ??
        BATCH_ARCHIVE_NAME,
      succeeded: Number(response.headers.get('X-Batch-Succeeded') ?? 0),
      failed: Number(response.headers.get('X-Batch-Failed') ?? 0),
      failures: parseBatchFailuresHeader(response.headers.get('X-Batch-Failures')),
    };
  },
};

export const saveDownloadedFile = ({ blob, fileName }: DownloadedFile) => {
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = fileName;
  document.body.appendChild(anchor);
  anchor.click();
  anchor.remove();
  URL.revokeObjectURL(url);
};
