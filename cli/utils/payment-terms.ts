import { DetectedLine } from '../types';

// la etiqueta va seguida de un separador o cierra la línea
const PAYMENT_TERMS_LABEL = /\b(?:payment\s+terms|terms\s+of\s+payment)\b\s*(?:[:\-–—]\s*(.*))?$/i;

/**
 * Busca las condiciones de pago en las líneas detectadas, en orden.
 * Gana la primera coincidencia: en cuanto aparece se deja de consumir el iterador.
 * Si la etiqueta no trae texto detrás, el valor es la siguiente línea no vacía.
 */
export async function findPaymentTerms(
  lines: AsyncIterable<DetectedLine> | Iterable<DetectedLine>
): Promise<string | undefined> {
  let labelPending = false;

  for await (const line of lines) {
    const text = line.text.trim();
    if (!text) continue;

    const match = PAYMENT_TERMS_LABEL.exec(text);
    if (match) {
      const trailing = (match[1] ?? '').trim();
      if (trailing) return trailing;
      labelPending = true;
      continue;
    }

    if (labelPending) return text;
  }

  return undefined;
}
