import { processInvoice, ProcessInvoiceDependencies } from './process-invoice';
import { objectKeyFor } from './upload-invoice';
import { mapWithConcurrency } from './utils/concurrency';
import { InvoiceProcessingError } from './errors';
import { InvoiceRecord } from './types';
import { logger as rootLogger } from './logger';

export type ProcessResult =
  | { ok: true; record: InvoiceRecord }
  | { ok: false; sourcePath: string; error: Error };

export interface ProcessBatchOptions {
  concurrency?: number;
}

/**
 * Agrupa los índices de las rutas por clave S3, en orden de aparición.
 * Dos rutas con el mismo nombre base comparten objeto y no pueden procesarse a la vez.
 */
export function groupByObjectKey(filePaths: readonly string[]): number[][] {
  const groups = new Map<string, number[]>();
  filePaths.forEach((filePath, index) => {
    const key = objectKeyFor(filePath);
    const group = groups.get(key);
    if (group) {
      group.push(index);
    } else {
      groups.set(key, [index]);
    }
  });
  return [...groups.values()];
}

/**
 * Procesa cada archivo de forma independiente: el fallo de uno no detiene al resto.
 * Devuelve un resultado por ruta, en el orden recibido.
 */
export async function processBatch(
  filePaths: readonly string[],
  deps: ProcessInvoiceDependencies,
  options: ProcessBatchOptions = {}
): Promise<ProcessResult[]> {
  const logger = deps.logger ?? rootLogger;
  const results: ProcessResult[] = new Array(filePaths.length);

  const processOne = async (filePath: string): Promise<ProcessResult> => {
    logger.info(`--- Procesando ${filePath} ---`);
    try {
      const record = await processInvoice(filePath, deps);
      return { ok: true, record };
    } catch (error) {
      const stage = error instanceof InvoiceProcessingError ? error.stage : undefined;
      logger.error({ err: error, stage }, `Error procesando ${filePath}`);
      return {
        ok: false,
        sourcePath: filePath,
        error: (error instanceof Error) ? error : new Error(String(error)),
      };
    } finally {
      logger.info(`--- Fin de ${filePath} ---`);
    }
  };

  // los grupos corren en paralelo; dentro de un grupo, uno detrás de otro
  await mapWithConcurrency(groupByObjectKey(filePaths), options.concurrency ?? 1, async (indexes) => {
    for (const index of indexes) {
      results[index] = await processOne(filePaths[index]);
    }
  });

  return results;
}
