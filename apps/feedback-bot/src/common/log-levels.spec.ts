import { resolveLogLevels } from './log-levels';

describe('resolveLogLevels', () => {
  it('should map LOG_LEVEL values to Nest logger levels', () => {
    expect(resolveLogLevels('debug')).toEqual(['error', 'warn', 'log', 'debug']);
    expect(resolveLogLevels('INFO')).toEqual(['error', 'warn', 'log']);
    expect(resolveLogLevels('warn')).toEqual(['error', 'warn']);
    expect(resolveLogLevels('error')).toEqual(['error']);
  });

  it('should fall back to info', () => {
    expect(resolveLogLevels(undefined)).toEqual(['error', 'warn', 'log']);
    expect(resolveLogLevels('chatty')).toEqual(['error', 'warn', 'log']);
  });
});
