import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatFields, getLogLevel, logger, setLogLevel } from '../../src/logger';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('formats fields as key=value and quotes values with spaces', () => {
    expect(formatFields({ size: 100, name: 'Test Game', skipped: undefined, ok: true })).toBe(
      ' size=100 name="Test Game" ok=true'
    );
    expect(formatFields()).toBe('');
  });

  it('writes timestamped lines at or above the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('info');

    logger.debug('hidden');
    logger.info('Batch selected', { size: 3 });
    logger.warn('Rate limited');

    expect(getLogLevel()).toBe('info');
    expect(log).toHaveBeenCalledTimes(1);
    const line = String(log.mock.calls[0][0]);
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] /);
    expect(line.endsWith('Batch selected size=3')).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
