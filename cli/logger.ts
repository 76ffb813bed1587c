import pino from 'pino';

export type { Logger } from 'pino';

// LOG_LEVEL se valida en loadConfig y se aplica en runCli
const defaultLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

// stdout queda reservado para el reporte
export const logger = pino(
  { level: defaultLevel },
  pino.destination({ dest: 2, sync: true })
);
