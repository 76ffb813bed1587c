import { Block, ExpenseDocument, ExpenseField } from '@aws-sdk/client-textract';
import { DetectedLine, ExpenseAnalysis, SummaryField } from '../types';

/**
 * Une las secciones de un mismo documento (facturas de varias páginas).
 * Los grupos de conceptos se concatenan; de los campos resumen solo se añaden tipos nuevos.
 */
export function mergeExpenseDocuments(docs: ExpenseDocument[]): ExpenseDocument | undefined {
  if (docs.length === 0) return undefined;

  const [first, ...rest] = docs;
  const summaryFields = [...(first.SummaryFields ?? [])];
  const lineItemGroups = [...(first.LineItemGroups ?? [])];
  const seenTypes = new Set(summaryFields.map((field) => field.Type?.Text));

  rest.forEach((doc) => {
    lineItemGroups.push(...(doc.LineItemGroups ?? []));
    doc.SummaryFields?.forEach((field) => {
      const fieldType = field.Type?.Text;
      if (fieldType && !seenTypes.has(fieldType)) {
        summaryFields.push(field);
        seenTypes.add(fieldType);
      }
    });
  });

  return { ...first, SummaryFields: summaryFields, LineItemGroups: lineItemGroups };
}

/**
 * Parsear información de factura
 */
export function parseExpenseDocuments(docs: ExpenseDocument[]): ExpenseAnalysis {
  const expenseDoc = mergeExpenseDocuments(docs);
  if (!expenseDoc) return { summaryFields: [], lineItems: [] };

  const summaryFields: SummaryField[] = [];
  const lineItems: ExpenseAnalysis['lineItems'] = [];

  expenseDoc.SummaryFields?.forEach((field) => {
    const fieldType = field.Type?.Text;
    if (fieldType) {
      summaryFields.push({
        type: fieldType,
        label: field.LabelDetection?.Text,
        value: field.ValueDetection?.Text,
      });
    }
  });

  expenseDoc.LineItemGroups?.forEach((group) => {
    group.LineItems?.forEach((item) => {
      lineItems.push(toFieldMap(item.LineItemExpenseFields ?? []));
    });
  });

  return { summaryFields, lineItems };
}

function toFieldMap(fields: ExpenseField[]): { [fieldType: string]: string | undefined } {
  const lineItem: { [fieldType: string]: string | undefined } = {};
  fields.forEach((field) => {
    const fieldType = field.Type?.Text;
    const fieldValue = field.ValueDetection?.Text;
    if (fieldType) {
      lineItem[fieldType] = fieldValue;
    }
  });
  return lineItem;
}

export function toDetectedLines(blocks: Block[]): DetectedLine[] {
  return blocks
    .filter((block) => block.BlockType === 'LINE' && block.Text !== undefined)
    .map((block) => ({
      text: block.Text ?? '',
      page: block.Page,
      top: block.Geometry?.BoundingBox?.Top,
      left: block.Geometry?.BoundingBox?.Left,
    }));
}
