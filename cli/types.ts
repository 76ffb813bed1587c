export interface ObjectRef {
  bucketName: string;
  objectKey: string;
}

export interface LineItem {
  description: string;
  amount?: string;
  quantity?: string;
  unitPrice?: string;
  hours?: string;
  rate?: string;
}

export type PaymentTermsSource = 'expense-analysis' | 'text-detection';

export interface InvoiceRecord {
  sourcePath: string;
  vendorName?: string;
  invoiceNumber?: string;
  invoiceDate?: string;
  total?: string;
  paymentTerms?: string;
  paymentTermsSource?: PaymentTermsSource;
  lineItems: LineItem[];
}

export interface SummaryField {
  type: string;
  label?: string;
  value?: string;
}

/**
 * Respuesta de AnalyzeExpense ya aplanada: un solo documento, campos en el orden emitido.
 */
export interface ExpenseAnalysis {
  summaryFields: SummaryField[];
  lineItems: { [fieldType: string]: string | undefined }[];
}

export interface DetectedLine {
  text: string;
  page?: number;
  top?: number;
  left?: number;
}

export interface ObjectStore {
  put(ref: ObjectRef, body: Uint8Array, contentType: string): Promise<void>;
}

export interface ExpenseAnalysisService {
  analyzeExpense(ref: ObjectRef): Promise<ExpenseAnalysis>;
}

export interface TextDetectionService {
  detectText(ref: ObjectRef): AsyncIterable<DetectedLine>;
}

export interface PipelineServices {
  store: ObjectStore;
  analyzer: ExpenseAnalysisService;
  detector: TextDetectionService;
}
