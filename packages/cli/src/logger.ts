import type { Logger } from '@hocr-verses/core';

type Namespace = 'Extract' | 'Watch' | 'Save';

export function createLogger(namespace: Namespace): Logger {
  const prefix = `[Verses:${namespace}]`;
  return {
    info: (msg: string) => console.debug(`${prefix} ${msg}`),
    warn: (msg: string) => console.warn(`${prefix} ${msg}`),
    error: (msg: string, err?: unknown) =>
      err ? console.error(`${prefix} ${msg}`, err) : console.error(`${prefix} ${msg}`),
  };
}
