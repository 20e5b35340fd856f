/**
 * Whole-document JSON file I/O on top of the typed serializer.
 * All operations are synchronous.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SchemaMismatchError, SerializationError, SerializationErrorCode } from './types.js';
import type { SerializationContext } from './context.js';
import type { TypeDescriptor } from './descriptors.js';
import { fromJson, parseJson, toRaw } from './serialize.js';
import { logger as rootLogger } from './logger.js';

const logger = rootLogger.child('files');

export const DEFAULT_FILE_EXTENSION = 'json';
const FILE_ENCODING = 'utf-8';

/**
 * Build `<directory>/<fileName>.<extension>`
 */
export function constructPath(
  fileName: string,
  directory = '',
  extension: string = DEFAULT_FILE_EXTENSION
): string {
  return path.join(directory, `${fileName}.${extension}`);
}

/**
 * Write a value as a JSON document, creating the directory when missing.
 * Returns the path written.
 */
export function toFile<T>(
  descriptor: TypeDescriptor<T>,
  value: T,
  fileName: string,
  directory: string,
  context: SerializationContext
): string {
  const text = toRaw(descriptor, value, context);
  const filePath = constructPath(fileName, directory);

  try {
    if (directory && !fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }
    fs.writeFileSync(filePath, text, { encoding: FILE_ENCODING });
  } catch (error) {
    throw new SerializationError(
      SerializationErrorCode.FILE_WRITE_FAILED,
      `Failed to write ${filePath}`,
      error,
      { path: filePath }
    );
  }

  logger.debug('Wrote document', {
    path: filePath,
    type: descriptor.typeName,
    bytes: Buffer.byteLength(text, FILE_ENCODING)
  });
  return filePath;
}

function readText(source: string | number): string {
  try {
    return fs.readFileSync(source, { encoding: FILE_ENCODING });
  } catch (error) {
    throw new SerializationError(
      SerializationErrorCode.FILE_READ_FAILED,
      `Failed to read ${typeof source === 'number' ? `file descriptor ${source}` : source}`,
      error,
      { source }
    );
  }
}

function readDocument<T>(
  descriptor: TypeDescriptor<T>,
  source: string | number,
  context: SerializationContext
): T {
  const document = fromJson(descriptor, parseJson(readText(source)), context);
  logger.debug('Read document', { source, type: descriptor.typeName });
  return document;
}

function readList<T>(
  descriptor: TypeDescriptor<T>,
  source: string | number,
  context: SerializationContext
): T[] {
  const json = parseJson(readText(source));
  if (!Array.isArray(json)) {
    throw new SchemaMismatchError('$', `array of ${descriptor.typeName}`);
  }
  const items = json.map((item, index) =>
    descriptor.parse(item, context, `$[${index}]`)
  );
  logger.debug('Read document list', { source, type: descriptor.typeName, count: items.length });
  return items;
}

/**
 * Read a JSON document as the type a descriptor describes
 */
export function fromFile<T>(
  descriptor: TypeDescriptor<T>,
  filePath: string,
  context: SerializationContext
): T {
  return readDocument(descriptor, filePath, context);
}

/**
 * Read a JSON document from an open file descriptor
 */
export function fromFileDescriptor<T>(
  descriptor: TypeDescriptor<T>,
  fd: number,
  context: SerializationContext
): T {
  return readDocument(descriptor, fd, context);
}

/**
 * Read a JSON array document as a list of typed values
 */
export function fromListInFile<T>(
  descriptor: TypeDescriptor<T>,
  filePath: string,
  context: SerializationContext
): T[] {
  return readList(descriptor, filePath, context);
}

export function fromListInFileDescriptor<T>(
  descriptor: TypeDescriptor<T>,
  fd: number,
  context: SerializationContext
): T[] {
  return readList(descriptor, fd, context);
}
