import { ProcessResult } from './process-batch';
import { InvoiceProcessingError } from './errors';
import { InvoiceRecord, LineItem } from './types';
import { wrapText } from './utils/text-wrap';

const RULE = '='.repeat(100);
const NOT_AVAILABLE = 'N/D';
const LABEL_WIDTH = 22;
const TERMS_WIDTH = 98;
const NUM_WIDTH = 4;
const DESC_WIDTH = 50;

function field(label: string, value: string | undefined): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value ?? NOT_AVAILABLE}`;
}

function paymentTermsLines(paymentTerms: string | undefined): string[] {
  const indent = ' '.repeat(LABEL_WIDTH);
  const wrapped = wrapText(paymentTerms ?? 'No disponible', TERMS_WIDTH - LABEL_WIDTH);
  return wrapped.map((line, index) => (index === 0 ? field('Condiciones de pago', line) : `${indent}${line}`));
}

function row(cells: [string, string, string, string, string]): string {
  const [num, desc, first, second, amount] = cells;
  return [num.padEnd(NUM_WIDTH), desc.padEnd(DESC_WIDTH), first.padEnd(8), second.padEnd(15), amount.padEnd(15)]
    .join(' | ')
    .trimEnd();
}

function lineItemLines(lineItems: LineItem[]): string[] {
  const lines = ['', '--- Conceptos ---'];
  if (lineItems.length === 0) {
    lines.push('  No se encontraron conceptos.');
    return lines;
  }

  const isService = lineItems[0].hours !== undefined;
  const header = isService
    ? row(['#', 'Descripción', 'Horas', 'Tarifa', 'Importe'])
    : row(['#', 'Descripción', 'Cant.', 'Precio unit.', 'Importe']);
  lines.push(header, '-'.repeat(header.length));

  lineItems.forEach((item, index) => {
    const description = wrapText(item.description.replace(/\n/g, ' '), DESC_WIDTH);
    const first = isService ? item.hours : item.quantity;
    const second = isService ? item.rate : item.unitPrice;

    lines.push(row([
      String(index + 1),
      description[0] ?? '',
      first ?? NOT_AVAILABLE,
      second ?? NOT_AVAILABLE,
      item.amount ?? NOT_AVAILABLE,
    ]));
    description.slice(1).forEach((continuation) => {
      lines.push(row(['', continuation, '', '', '']));
    });
    if (index < lineItems.length - 1) {
      lines.push(row(['-'.repeat(NUM_WIDTH), '-'.repeat(DESC_WIDTH), '-'.repeat(8), '-'.repeat(15), '-'.repeat(15)]));
    }
  });
  return lines;
}

export function renderRecord(record: InvoiceRecord): string[] {
  return [
    RULE,
    `Resultados de extracción: ${record.sourcePath}`,
    RULE,
    field('Proveedor', record.vendorName),
    field('Número de factura', record.invoiceNumber),
    field('Fecha de factura', record.invoiceDate),
    field('Total', record.total),
    ...paymentTermsLines(record.paymentTerms),
    ...lineItemLines(record.lineItems),
    RULE,
  ];
}

export function renderFailure(sourcePath: string, error: Error): string[] {
  const stage = error instanceof InvoiceProcessingError ? `[${error.stage}] ` : '';
  return [
    RULE,
    `Error procesando: ${sourcePath}`,
    RULE,
    `${stage}${error.message}`,
    RULE,
  ];
}

export function renderResult(result: ProcessResult): string[] {
  return result.ok ? renderRecord(result.record) : renderFailure(result.sourcePath, result.error);
}

/**
 * Imprime los resultados en el orden de los archivos recibidos.
 */
export function reportResults(results: ProcessResult[], write: (line: string) => void = console.log): void {
  results.forEach((result) => {
    renderResult(result).forEach((line) => write(line));
    write('');
  });
  const succeeded = results.filter((result) => result.ok).length;
  write(`Facturas procesadas: ${succeeded} de ${results.length}`);
}
