import { parseAmount } from './amount';
import { ExpenseAnalysis, InvoiceRecord, LineItem } from '../types';

// Campos resumen que nunca se interpretan como conceptos
const HEADER_FIELD_TYPES = new Set([
  'TOTAL',
  'SUBTOTAL',
  'TAX',
  'INVOICE_RECEIPT_ID',
  'INVOICE_RECEIPT_DATE',
  'VENDOR_NAME',
  'VENDOR_ADDRESS',
  'RECEIVER_NAME',
  'RECEIVER_ADDRESS',
  'DUE_DATE',
  'PAYMENT_TERMS',
  'TERMS',
  'SHIPPING_HANDLING_CHARGE',
  'GRATUITY',
  'ADDRESS',
  'STREET',
  'CITY',
  'STATE',
  'ZIP_CODE',
  'NAME',
  'ADDRESS_BLOCK',
  'CLIENT_MATTER',
  'CLIENT_ID',
]);

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Construye el registro de la factura a partir del análisis de gastos.
 * Los tipos desconocidos se ignoran; ante tipos repetidos gana el último valor no vacío.
 */
export function buildInvoiceRecord(sourcePath: string, analysis: ExpenseAnalysis): InvoiceRecord {
  const summary = new Map<string, string>();
  analysis.summaryFields.forEach((field) => {
    const value = nonBlank(field.value);
    if (value !== undefined) summary.set(field.type, value);
  });

  const paymentTerms = summary.get('PAYMENT_TERMS') ?? summary.get('TERMS');
  const vendorName = summary.get('VENDOR_NAME');

  let lineItems = analysis.lineItems
    .map(toLineItem)
    .filter((item): item is LineItem => item !== undefined);

  if (lineItems.length === 0) {
    lineItems = summaryFieldLineItems(analysis);
  }

  return {
    sourcePath,
    vendorName: vendorName?.replace(/\n/g, ' '),
    invoiceNumber: summary.get('INVOICE_RECEIPT_ID'),
    invoiceDate: summary.get('INVOICE_RECEIPT_DATE'),
    total: summary.get('TOTAL'),
    paymentTerms,
    paymentTermsSource: paymentTerms !== undefined ? 'expense-analysis' : undefined,
    lineItems,
  };
}

function toLineItem(fields: { [fieldType: string]: string | undefined }): LineItem | undefined {
  const description = fields.ITEM;
  if (description === undefined) return undefined;

  const item: LineItem = { description, amount: nonBlank(fields.PRICE) ?? nonBlank(fields.AMOUNT) };
  const quantity = nonBlank(fields.QUANTITY);
  const hours = nonBlank(fields.HOURS);
  const isService = hours !== undefined || (quantity !== undefined && quantity.includes('.'));

  if (isService) {
    item.hours = hours ?? quantity;
    item.rate = fields.RATE;
  } else if (quantity !== undefined) {
    item.quantity = quantity;
    item.unitPrice = fields.UNIT_PRICE;
  }
  return item;
}

/**
 * Algunas facturas de servicios no traen grupos de conceptos: los importes
 * aparecen como campos resumen sueltos.
 */
function summaryFieldLineItems(analysis: ExpenseAnalysis): LineItem[] {
  return analysis.summaryFields
    .filter((field) => !HEADER_FIELD_TYPES.has(field.type))
    .filter((field) => parseAmount(field.value) !== undefined)
    .map((field) => ({
      description: nonBlank(field.label) ?? field.type,
      amount: field.value,
    }));
}
