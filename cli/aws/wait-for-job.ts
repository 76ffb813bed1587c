import { setTimeout as sleep } from 'node:timers/promises';
import { JobStatus } from '@aws-sdk/client-textract';
import { Logger, logger as rootLogger } from '../logger';

interface JobStatusResponse {
  JobStatus?: JobStatus;
  StatusMessage?: string;
}

export interface WaitForJobOptions {
  jobId: string;
  intervalMs: number;
  logger?: Logger;
}

/**
 * Consulta el estado de un trabajo asíncrono de Textract hasta que deja de estar IN_PROGRESS.
 * Devuelve la última respuesta, que ya contiene la primera página de resultados.
 */
export async function waitForJob<T extends JobStatusResponse>(
  getJob: () => Promise<T>,
  options: WaitForJobOptions
): Promise<T> {
  const { jobId, intervalMs, logger = rootLogger } = options;

  let response: T;
  do {
    await sleep(intervalMs);
    response = await getJob();
    logger.debug({ jobId, jobStatus: response.JobStatus }, 'Estado del trabajo de Textract');
  } while (response.JobStatus === 'IN_PROGRESS');

  const status: JobStatus | undefined = response.JobStatus;
  // FAILED y PARTIAL_SUCCESS cuentan como fallo
  if (status !== 'SUCCEEDED') {
    const detail = response.StatusMessage ? `: ${response.StatusMessage}` : '';
    throw new Error(`El trabajo ${jobId} de Textract terminó con estado ${status ?? 'desconocido'}${detail}`);
  }

  return response;
}
