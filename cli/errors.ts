export type ProcessingStage = 'read' | 'upload' | 'analyze' | 'detect-text';

export class InvoiceProcessingError extends Error {
  readonly stage: ProcessingStage;

  constructor(stage: ProcessingStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

/** El archivo local no existe o no se puede leer. */
export class LocalFileError extends InvoiceProcessingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('read', message, options);
  }
}

/** Falló la subida a S3 (red, permisos, bucket inexistente). */
export class RemoteStoreError extends InvoiceProcessingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('upload', message, options);
  }
}

/** Falló el análisis de gastos de Textract. */
export class AnalysisError extends InvoiceProcessingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('analyze', message, options);
  }
}

/** Falló la detección de texto usada como respaldo para las condiciones de pago. */
export class TextDetectionError extends InvoiceProcessingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('detect-text', message, options);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return (error instanceof Error) ? error.message : 'Error desconocido';
}
