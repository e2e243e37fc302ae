import pino, { stdSerializers, type Bindings, type Logger } from 'pino';

import type { EnvConfig } from './env.js';

export type { Logger };

// stdout belongs to the renderer, so logs go to a file or to stderr.
export const createLogger = (logging: EnvConfig['logging'], bindings?: Bindings): Logger => {
  const root = pino(
    {
      level: logging.level,
      base: {
        service: 'terminal-pong',
      },
      serializers: {
        err: stdSerializers.err,
      },
    },
    pino.destination({ dest: logging.file ?? 2, sync: true, mkdir: logging.file !== undefined }),
  );

  return bindings ? root.child(bindings) : root;
};

export const createModuleLogger = (parent: Logger, moduleName: string, bindings?: Bindings): Logger => {
  return parent.child({ module: moduleName, ...(bindings ?? {}) });
};

export const silentLogger = (): Logger => pino({ level: 'silent' });
