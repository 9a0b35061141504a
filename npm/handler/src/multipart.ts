/**
 * Streaming `multipart/form-data` parser.
 *
 * Text fields are kept in memory. File parts share an in-memory budget of
 * `maxMemorySize` bytes; a part that does not fit is written to a temporary
 * directory and exposed as a file-backed `File`.
 */

import { once } from 'node:events';
import { File } from 'node:buffer';
import { createWriteStream, openAsBlob } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import busboy from 'busboy';
import { PayloadTooLargeError, toError } from './errors';
import type { UploadedFile } from './types';

export interface MultipartForm {
  /**
   * Text fields. The first value of a repeated field wins.
   */
  readonly fields: ReadonlyMap<string, string>;
  readonly files: Readonly<Record<string, ReadonlyArray<UploadedFile>>>;

  /**
   * Directory holding spilled parts, if any were spilled.
   */
  readonly tempDir?: string;
}

interface FilePart {
  readonly name: string;
  readonly file: UploadedFile;
}

async function* readChunks(request: Request): AsyncGenerator<Uint8Array> {
  if (!request.body) {
    return;
  }
  const reader = request.body.getReader();
  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      return;
    }
    const chunk: Uint8Array = value;
    yield chunk;
  }
}

/**
 * Parses a multipart request body.
 *
 * Rejects on malformed input or on a text field longer than
 * `maxMemorySize`. Temporary files are removed again when parsing fails;
 * on success the caller owns `tempDir`.
 */
export async function parseMultipart(
  request: Request,
  maxMemorySize: number
): Promise<MultipartForm> {
  const parser = busboy({
    headers: { 'content-type': request.headers.get('content-type') ?? '' },
    limits: { fieldSize: maxMemorySize },
  });

  const fields = new Map<string, string>();
  const parts: Array<Promise<FilePart>> = [];
  let memoryLeft = maxMemorySize;
  let tempDir: string | undefined;
  let spillCount = 0;

  const spillPath = async (): Promise<string> => {
    tempDir ??= await mkdtemp(join(tmpdir(), 'gqlserve-'));
    spillCount += 1;
    return join(tempDir, `upload-${spillCount}`);
  };

  const collectFile = async (
    name: string,
    stream: Readable,
    info: busboy.FileInfo
  ): Promise<FilePart> => {
    const buffered: Buffer[] = [];
    let bufferedSize = 0;
    let writer: ReturnType<typeof createWriteStream> | undefined;
    let path = '';

    for await (const chunk of stream) {
      const data: Buffer = chunk;
      if (!writer && bufferedSize + data.byteLength <= memoryLeft) {
        buffered.push(data);
        bufferedSize += data.byteLength;
        memoryLeft -= data.byteLength;
        continue;
      }

      buffered.push(data);
      if (!writer) {
        // The part no longer fits: move it to disk and give its memory back.
        path = await spillPath();
        writer = createWriteStream(path);
        memoryLeft += bufferedSize;
      }

      for (const pending of buffered.splice(0)) {
        if (!writer.write(pending)) {
          await once(writer, 'drain');
        }
      }
    }

    if (!writer) {
      return { name, file: new File(buffered, info.filename, { type: info.mimeType }) };
    }

    writer.end();
    await once(writer, 'finish');
    const blob = await openAsBlob(path, { type: info.mimeType });
    return { name, file: new File([blob], info.filename, { type: info.mimeType }) };
  };

  parser.on('field', (name, value, info) => {
    if (info.valueTruncated) {
      parser.destroy(new PayloadTooLargeError(maxMemorySize));
      return;
    }
    if (!fields.has(name)) {
      fields.set(name, value);
    }
  });

  parser.on('file', (name, stream, info) => {
    const part = collectFile(name, stream, info);
    part.catch((error: unknown) => parser.destroy(toError(error)));
    parts.push(part);
  });

  try {
    await Promise.all([
      pipeline(Readable.from(readChunks(request)), parser),
      once(parser, 'close'),
    ]);

    const files: Record<string, UploadedFile[]> = {};
    for (const { name, file } of await Promise.all(parts)) {
      (files[name] ??= []).push(file);
    }
    return { fields, files, tempDir };
  } catch (error) {
    await removeTempFiles(tempDir);
    throw error;
  }
}

/**
 * Removes the temporary files of a parsed form.
 */
export async function removeTempFiles(tempDir: string | undefined): Promise<void> {
  if (tempDir) {
    await rm(tempDir, { recursive: true, force: true });
  }
}
