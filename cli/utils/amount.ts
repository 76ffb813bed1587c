/**
 * Convierte un importe con formato US ("1,234.56") o europeo ("1.234,56", "12,5") a número.
 * Devuelve undefined si el texto no es numérico.
 */
export function parseAmount(value: string | undefined): number | undefined {
  if (!value) return undefined;

  const cleaned = value.replace(/[€$ ]/g, '').trim();
  if (!/^-?[\d.,]+$/.test(cleaned)) return undefined;

  const commas = cleaned.split(',').length - 1;
  const periods = cleaned.split('.').length - 1;
  let normalized = cleaned;

  if (periods > 0 && commas === 1 && cleaned.lastIndexOf('.') < cleaned.lastIndexOf(',')) {
    normalized = cleaned.replace(/\./g, '').replace(',', '.');
  } else if (commas > 0 && (periods === 0 || cleaned.lastIndexOf(',') < cleaned.lastIndexOf('.'))) {
    // "1,234" sin decimales se toma como separador de miles, igual que "1,234.56"
    normalized = commas === 1 && periods === 0 && !/,\d{3}$/.test(cleaned)
      ? cleaned.replace(',', '.')
      : cleaned.replace(/,/g, '');
  }

  const amount = Number(normalized);
  return Number.isFinite(amount) ? amount : undefined;
}
