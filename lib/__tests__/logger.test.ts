import { describe, it, expect } from 'vitest';

import { componentLogger, loggerOptions } from '../logger';

describe('loggerOptions', () => {
  it('should write plain JSON in production', () => {
    expect(loggerOptions({ NODE_ENV: 'production', LOG_LEVEL: 'warn' })).toEqual({
      name: 'netprobe',
      level: 'warn',
    });
  });

  it('should pretty-print with the component prefix outside production', () => {
    const options = loggerOptions({});

    expect(options.level).toBe('info');
    expect(options.transport).toEqual({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,name',
        messageFormat: '{if component}[{component}] {end}{msg}',
      },
    });
  });

  it('should tag child loggers with their component', () => {
    expect(componentLogger('runner').bindings()).toMatchObject({ component: 'runner' });
  });
});
