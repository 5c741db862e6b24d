// This helper builds a pino logger whose JSON lines are collected in memory for assertions.

import pino, { type Logger } from 'pino';

export interface CapturedLogLine {
  level: number;
  msg: string;
  event?: string;
  [key: string]: unknown;
}

export function createCapturingLogger(): { logger: Logger; lines: CapturedLogLine[] } {
  const lines: CapturedLogLine[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        lines.push(JSON.parse(line) as CapturedLogLine);
      }
    }
  );

  return { logger, lines };
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
