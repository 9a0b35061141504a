/**
 * Resolves GraphQL request options from an HTTP request.
 *
 * Sources are tried in order and the first one that yields options wins.
 * Malformed input never fails the request: it resolves to empty options and
 * graphql-js reports the missing document.
 */

import { toError } from './errors';
import type { Logger } from './logger';
import { parseMultipart, removeTempFiles } from './multipart';
import type { RequestOptions, UploadedFile } from './types';

export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_GRAPHQL = 'application/graphql';
export const CONTENT_TYPE_FORM_URLENCODED = 'application/x-www-form-urlencoded';
export const CONTENT_TYPE_MULTIPART_FORM_DATA = 'multipart/form-data';

/**
 * 10 MiB.
 */
export const DEFAULT_MAX_UPLOAD_MEMORY_SIZE = 10 * 1024 * 1024;

export interface ResolveOptions {
  readonly maxUploadMemorySize?: number;
  readonly logger?: Logger;
}

type OptionsSource = (
  request: Request,
  maxUploadMemorySize: number
) => Promise<RequestOptions | undefined> | RequestOptions | undefined;

/**
 * Spill directories of multipart uploads, keyed by the options they belong to.
 */
const tempDirs = new WeakMap<RequestOptions, string>();

type BodyParser = (
  request: Request,
  maxUploadMemorySize: number
) => Promise<RequestOptions>;

/**
 * Creates a fresh empty options record.
 */
export function emptyRequestOptions(): RequestOptions {
  return Object.freeze({
    query: '',
    variables: Object.freeze({}),
    operationName: '',
    uploadedFiles: Object.freeze({}),
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses the `variables` field of a form. Anything but a JSON object gives `{}`.
 */
export function parseVariables(raw: string | null | undefined): Record<string, unknown> {
  if (!raw) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isPlainObject(parsed) ? parsed : {};
  } catch {
    // Malformed variables are treated as absent.
    return {};
  }
}

/**
 * Extracts options from form-like fields. Yields nothing without a `query`.
 */
function fromFields(
  get: (name: string) => string | null,
  uploadedFiles: Record<string, ReadonlyArray<UploadedFile>> = {}
): RequestOptions | undefined {
  const query = get('query');
  if (!query) {
    return undefined;
  }
  return Object.freeze({
    query,
    variables: Object.freeze(parseVariables(get('variables'))),
    operationName: get('operationName') ?? '',
    uploadedFiles: Object.freeze(uploadedFiles),
  });
}

/**
 * Returns the media type of a Content-Type header without its parameters.
 */
export function getMediaType(contentType: string | null): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

const fromGraphQLBody: BodyParser = async (request) => {
  return Object.freeze({ ...emptyRequestOptions(), query: await request.text() });
};

const fromUrlEncodedBody: BodyParser = async (request) => {
  const fields = new URLSearchParams(await request.text());
  return fromFields((name) => fields.get(name)) ?? emptyRequestOptions();
};

const fromMultipartBody: BodyParser = async (request, maxUploadMemorySize) => {
  const form = await parseMultipart(request, maxUploadMemorySize);
  const options = fromFields((name) => form.fields.get(name) ?? null, { ...form.files });
  if (!options) {
    await removeTempFiles(form.tempDir);
    return emptyRequestOptions();
  }
  if (form.tempDir) {
    tempDirs.set(options, form.tempDir);
  }
  return options;
};

const fromJsonBody: BodyParser = async (request) => {
  const parsed: unknown = JSON.parse(await request.text());
  if (!isPlainObject(parsed)) {
    return emptyRequestOptions();
  }
  return Object.freeze({
    query: typeof parsed.query === 'string' ? parsed.query : '',
    variables: Object.freeze(isPlainObject(parsed.variables) ? parsed.variables : {}),
    operationName: typeof parsed.operationName === 'string' ? parsed.operationName : '',
    uploadedFiles: Object.freeze({}),
  });
};

const BODY_PARSERS: Readonly<Record<string, BodyParser>> = {
  [CONTENT_TYPE_GRAPHQL]: fromGraphQLBody,
  [CONTENT_TYPE_FORM_URLENCODED]: fromUrlEncodedBody,
  [CONTENT_TYPE_MULTIPART_FORM_DATA]: fromMultipartBody,
  [CONTENT_TYPE_JSON]: fromJsonBody,
};

const fromQueryString: OptionsSource = (request) => {
  const params = new URL(request.url).searchParams;
  return fromFields((name) => params.get(name));
};

const withoutBody: OptionsSource = (request) => {
  if (request.method !== 'POST' || request.body === null) {
    return emptyRequestOptions();
  }
  return undefined;
};

const fromBody: OptionsSource = (request, maxUploadMemorySize) => {
  const mediaType = getMediaType(request.headers.get('content-type'));
  const parse = BODY_PARSERS[mediaType] ?? fromJsonBody;
  return parse(request, maxUploadMemorySize);
};

const SOURCES: ReadonlyArray<OptionsSource> = [fromQueryString, withoutBody, fromBody];

/**
 * Resolves the GraphQL request options carried by `request`.
 *
 * Never rejects. Parse failures resolve to empty options.
 *
 * @example
 * ```typescript
 * const options = await resolveRequestOptions(
 *   new Request('http://localhost/graphql?query={hello}')
 * );
 * options.query; // '{hello}'
 * ```
 */
export async function resolveRequestOptions(
  request: Request,
  options: ResolveOptions = {}
): Promise<RequestOptions> {
  const { maxUploadMemorySize = DEFAULT_MAX_UPLOAD_MEMORY_SIZE, logger } = options;

  try {
    for (const source of SOURCES) {
      const resolved = await source(request, maxUploadMemorySize);
      if (resolved) {
        return resolved;
      }
    }
  } catch (error) {
    logger?.debug('Could not read GraphQL request options', {
      method: request.method,
      contentType: request.headers.get('content-type'),
      error: toError(error).message,
    });
  }

  return emptyRequestOptions();
}

/**
 * Deletes the temporary files behind `options.uploadedFiles`, if any. Files
 * that were spilled to disk cannot be read afterwards.
 */
export async function releaseRequestOptions(options: RequestOptions): Promise<void> {
  const tempDir = tempDirs.get(options);
  tempDirs.delete(options);
  await removeTempFiles(tempDir);
}
