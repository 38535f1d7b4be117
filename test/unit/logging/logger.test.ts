import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from '../../../src/logging/logger.js';

describe('Logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('writes a prefixed line with level and scope', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    setLogLevel('info');

    createLogger('scan-cache').warn('Cache read failed', new Error('EACCES'));

    expect(stderr).toHaveBeenCalledWith('[PhishScope] WARN [scan-cache] Cache read failed: EACCES\n');
  });

  it('drops messages below the current level', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    setLogLevel('warn');

    const log = createLogger('orchestrator');
    log.debug('debug line');
    log.info('info line');

    expect(stderr).not.toHaveBeenCalled();
  });

  it('formats non-Error causes', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    setLogLevel('debug');

    createLogger('api').error('Handler failed', 'boom');

    expect(stderr).toHaveBeenCalledWith('[PhishScope] ERROR [api] Handler failed: boom\n');
  });
});
