import path from 'path';
import { readFile } from 'fs/promises';
import { LocalFileError, RemoteStoreError, errorMessage } from './errors';
import { ObjectRef, ObjectStore } from './types';

const CONTENT_TYPES: { [extension: string]: string } = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

/**
 * La clave es el nombre base del archivo: volver a procesarlo sobrescribe el mismo objeto.
 */
export function objectKeyFor(filePath: string): string {
  return path.basename(filePath);
}

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

export async function uploadInvoice(filePath: string, bucketName: string, store: ObjectStore): Promise<ObjectRef> {
  let body: Buffer;
  try {
    body = await readFile(filePath);
  } catch (error) {
    throw new LocalFileError(`No se pudo leer el archivo ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  const ref: ObjectRef = { bucketName, objectKey: objectKeyFor(filePath) };
  try {
    await store.put(ref, body, contentTypeFor(filePath));
  } catch (error) {
    throw new RemoteStoreError(
      `No se pudo subir ${ref.objectKey} al bucket ${bucketName}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  return ref;
}
