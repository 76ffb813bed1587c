export const USAGE = `Uso: invoice-extractor <archivo> [archivo...]

Sube cada factura a S3, extrae sus datos con Textract y muestra el resultado.

Variables de entorno:
  INVOICE_BUCKET_NAME         bucket S3 de subida (obligatoria)
  AWS_REGION                  región de AWS
  TEXTRACT_POLL_INTERVAL_MS   intervalo de consulta de los trabajos (5000)
  INVOICE_CONCURRENCY         facturas procesadas a la vez (1)
  LOG_LEVEL                   nivel de log de pino (info)`;

export type CliArgs =
  | { kind: 'help' }
  | { kind: 'files'; files: string[] }
  | { kind: 'invalid'; message: string };

export function parseArgs(argv: string[]): CliArgs {
  const files: string[] = [];
  for (const arg of argv) {
    if (arg === '-h' || arg === '--help') return { kind: 'help' };
    if (arg.startsWith('-') && arg !== '-') {
      return { kind: 'invalid', message: `Opción desconocida: ${arg}` };
    }
    files.push(arg);
  }

  if (files.length === 0) {
    return { kind: 'invalid', message: 'Debe indicar al menos un archivo.' };
  }
  return { kind: 'files', files };
}
