import path from 'path';
import { rmSync } from 'fs';
import { runCli, EXIT_FILE_FAILED, EXIT_OK, EXIT_USAGE } from '../cli/main';
import { parseArgs, USAGE } from '../cli/args';
import { ExtractorConfig } from '../cli/config';
import { FakeExpenseAnalyzer, FakeObjectStore, FakeTextDetector, createInvoiceFiles, summary } from './fakes';

describe('parseArgs', () => {
  it('collects file paths', () => {
    expect(parseArgs(['a.pdf', 'b.pdf'])).toEqual({ kind: 'files', files: ['a.pdf', 'b.pdf'] });
  });

  it('recognises help', () => {
    expect(parseArgs(['a.pdf', '--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('rejects unknown options and empty argument lists', () => {
    expect(parseArgs(['--json', 'a.pdf'])).toEqual({ kind: 'invalid', message: 'Opción desconocida: --json' });
    expect(parseArgs([])).toEqual({ kind: 'invalid', message: 'Debe indicar al menos un archivo.' });
  });
});

describe('runCli', () => {
  const { dir, paths } = createInvoiceFiles('invoice-A.pdf');
  const [invoiceA] = paths;
  const env = { INVOICE_BUCKET_NAME: 'test-bucket', TEXTRACT_POLL_INTERVAL_MS: '0' };

  afterAll(() => rmSync(dir, { recursive: true, force: true }));

  function fakeServices(configs: ExtractorConfig[] = []) {
    return (config: ExtractorConfig) => {
      configs.push(config);
      return {
        store: new FakeObjectStore(),
        analyzer: new FakeExpenseAnalyzer({ 'invoice-A.pdf': summary({ VENDOR_NAME: 'Acme', TOTAL: '100.00' }) }),
        detector: new FakeTextDetector({ 'invoice-A.pdf': ['Payment Terms: Net 30'] }),
      };
    };
  }

  it('prints usage for --help', async () => {
    const written: string[] = [];

    const exitCode = await runCli(['--help'], { write: (line) => written.push(line) });

    expect(exitCode).toBe(EXIT_OK);
    expect(written).toEqual([USAGE]);
  });

  it('exits with a usage error without files', async () => {
    const errors: string[] = [];

    const exitCode = await runCli([], { env, writeError: (line) => errors.push(line) });

    expect(exitCode).toBe(EXIT_USAGE);
    expect(errors[0]).toBe('Debe indicar al menos un archivo.');
  });

  it('exits with a usage error when the configuration is invalid', async () => {
    const errors: string[] = [];
    const createServices = jest.fn(fakeServices());

    const exitCode = await runCli([invoiceA], { env: {}, writeError: (line) => errors.push(line), createServices });

    expect(exitCode).toBe(EXIT_USAGE);
    expect(errors[0]).toMatch(/^Configuración inválida: INVOICE_BUCKET_NAME/);
    expect(createServices).not.toHaveBeenCalled();
  });

  it('exits with a usage error for an unknown log level', async () => {
    const errors: string[] = [];
    const createServices = jest.fn(fakeServices());

    const exitCode = await runCli([invoiceA], {
      env: { ...env, LOG_LEVEL: 'verbose' },
      writeError: (line) => errors.push(line),
      createServices,
    });

    expect(exitCode).toBe(EXIT_USAGE);
    expect(errors[0]).toMatch(/^Configuración inválida: LOG_LEVEL/);
    expect(createServices).not.toHaveBeenCalled();
  });

  it('reports the extracted invoice and exits cleanly', async () => {
    const written: string[] = [];
    const configs: ExtractorConfig[] = [];

    const exitCode = await runCli([invoiceA], {
      env,
      write: (line) => written.push(line),
      createServices: fakeServices(configs),
    });

    expect(exitCode).toBe(EXIT_OK);
    expect(configs[0].bucketName).toBe('test-bucket');
    expect(written).toContain(`${'Condiciones de pago:'.padEnd(22)}Net 30`);
    expect(written[written.length - 1]).toBe('Facturas procesadas: 1 de 1');
  });

  it('exits with a failure code when any file fails but still reports the others', async () => {
    const written: string[] = [];
    const missing = path.join(dir, 'missing.pdf');

    const exitCode = await runCli([missing, invoiceA], {
      env,
      write: (line) => written.push(line),
      createServices: fakeServices(),
    });

    expect(exitCode).toBe(EXIT_FILE_FAILED);
    expect(written).toContain(`Error procesando: ${missing}`);
    expect(written).toContain(`Resultados de extracción: ${invoiceA}`);
    expect(written[written.length - 1]).toBe('Facturas procesadas: 1 de 2');
  });
});
