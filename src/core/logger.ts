/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per log line, always on stderr because the CLI scripts
 * print their answers on stdout. In development the stream is piped through
 * `pino-pretty` (colors, readable timestamps, no pid/hostname). When
 * LOG_FILE is set a `pino/file` target also appends the raw JSON lines to it.
 *
 * The exported `Logger` type lets other modules declare "I need a logger"
 * without coupling to Pino directly; tests hand in a silent instance.
 */
import pino from 'pino';

import { type AppConfig, config } from './config';

type LogSettings = Pick<AppConfig, 'isDev' | 'log'>;

/** Every target writes to stderr or a file; stdout belongs to the CLI output. */
export function buildTargets(settings: LogSettings): pino.TransportTargetOptions[] {
  if (settings.log.level === 'silent') return [];

  const targets: pino.TransportTargetOptions[] = [];

  if (settings.isDev) {
    targets.push({
      target: 'pino-pretty',
      level: settings.log.level,
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    });
  } else {
    targets.push({ target: 'pino/file', level: settings.log.level, options: { destination: 2 } });
  }

  if (settings.log.file) {
    targets.push({
      target: 'pino/file',
      level: settings.log.level,
      options: { destination: settings.log.file, mkdir: true },
    });
  }

  return targets;
}

const targets = buildTargets(config);

export const logger = pino({
  level: config.log.level,
  transport: targets.length > 0 ? { targets } : undefined,
});

export type Logger = pino.Logger;
