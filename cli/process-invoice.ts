import path from 'path';
import { uploadInvoice } from './upload-invoice';
import { buildInvoiceRecord } from './utils/invoice-mapper';
import { findPaymentTerms } from './utils/payment-terms';
import { AnalysisError, TextDetectionError, errorMessage } from './errors';
import { ExpenseAnalysis, InvoiceRecord, ObjectRef, PipelineServices, TextDetectionService } from './types';
import { Logger, logger as rootLogger } from './logger';

export interface ProcessInvoiceDependencies extends PipelineServices {
  bucketName: string;
  logger?: Logger;
}

/**
 * Sube la factura, la analiza y, si faltan las condiciones de pago, recurre a la detección de texto.
 * Lanza LocalFileError, RemoteStoreError o AnalysisError; el fallo del respaldo no es fatal.
 */
export async function processInvoice(filePath: string, deps: ProcessInvoiceDependencies): Promise<InvoiceRecord> {
  const logger = (deps.logger ?? rootLogger).child({ file: path.basename(filePath) });

  logger.info(`Subiendo ${filePath} al bucket ${deps.bucketName}`);
  const ref = await uploadInvoice(filePath, deps.bucketName, deps.store);

  logger.info({ objectKey: ref.objectKey }, 'Iniciando análisis de gastos');
  let analysis: ExpenseAnalysis;
  try {
    analysis = await deps.analyzer.analyzeExpense(ref);
  } catch (error) {
    throw new AnalysisError(`Falló el análisis de gastos de ${ref.objectKey}: ${errorMessage(error)}`, { cause: error });
  }
  const record = buildInvoiceRecord(filePath, analysis);

  if (record.paymentTerms !== undefined) {
    return record;
  }

  logger.warn('El análisis no encontró condiciones de pago. Usando detección de texto.');
  try {
    const paymentTerms = await detectPaymentTerms(deps.detector, ref);
    if (paymentTerms === undefined) {
      logger.info('La detección de texto no encontró condiciones de pago');
      return record;
    }
    return { ...record, paymentTerms, paymentTermsSource: 'text-detection' };
  } catch (error) {
    logger.warn({ err: error }, 'Falló la detección de texto; se continúa sin condiciones de pago');
    return record;
  }
}

async function detectPaymentTerms(detector: TextDetectionService, ref: ObjectRef): Promise<string | undefined> {
  try {
    return await findPaymentTerms(detector.detectText(ref));
  } catch (error) {
    throw new TextDetectionError(`Falló la detección de texto de ${ref.objectKey}: ${errorMessage(error)}`, { cause: error });
  }
}
