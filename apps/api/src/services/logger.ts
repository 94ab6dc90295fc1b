import type { FastifyBaseLogger } from 'fastify';
import { pino } from 'pino';

export type Logger = FastifyBaseLogger;

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
