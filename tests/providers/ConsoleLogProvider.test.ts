import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConsoleLogProvider, formatLogLine } from '../../src/providers/ConsoleLogProvider.js';

describe('ConsoleLogProvider', () => {
  let provider: ConsoleLogProvider;

  beforeEach(() => {
    provider = new ConsoleLogProvider();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // --- log() ---

  it('should stamp events that arrive without a timestamp', () => {
    provider.log({ level: 'info', message: 'Ontology loaded' });

    const [event] = provider.events;
    expect(typeof event.timestamp).toBe('string');
    expect(new Date(String(event.timestamp)).toISOString()).toBe(event.timestamp);
  });

  it('should keep a timestamp the caller supplied', () => {
    provider.log({ level: 'warn', message: 'late', timestamp: '2026-03-01T08:00:00.000Z' });

    expect(provider.events[0].timestamp).toBe('2026-03-01T08:00:00.000Z');
  });

  it('should record level, message and fields from the helpers', () => {
    provider.info('Analysis completed', { projectId: 'p1' });
    provider.warn('Profile lookup failed', { source: 'github' });
    provider.error('Completion failed', { attempts: 3 });
    provider.debug('Pipeline stage changed', { stage: 'filtering' });

    expect(provider.events.map(({ level, message, fields }) => ({ level, message, fields }))).toEqual([
      { level: 'info', message: 'Analysis completed', fields: { projectId: 'p1' } },
      { level: 'warn', message: 'Profile lookup failed', fields: { source: 'github' } },
      { level: 'error', message: 'Completion failed', fields: { attempts: 3 } },
      { level: 'debug', message: 'Pipeline stage changed', fields: { stage: 'filtering' } },
    ]);
  });

  // --- minLevel ---

  it('should drop events below the minimum level', () => {
    const quiet = new ConsoleLogProvider({ minLevel: 'warn' });
    quiet.debug('noise');
    quiet.info('progress');
    quiet.warn('fallback used');
    quiet.error('stage failed');

    expect(quiet.events.map((e) => e.message)).toEqual(['fallback used', 'stage failed']);
  });

  // --- eventsAt() ---

  it('should filter events by exact level', () => {
    provider.info('one');
    provider.warn('two');
    provider.info('three');

    expect(provider.eventsAt('info').map((e) => e.message)).toEqual(['one', 'three']);
    expect(provider.eventsAt('error')).toEqual([]);
  });

  // --- console output ---

  it('should route console output by level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({ outputToConsole: true });

    loud.warn('Completion attempt failed, retrying', { attempt: 1 });
    loud.info('done');
    loud.error('Analysis failed', { stage: 'classifying' });

    expect(warn.mock.calls).toEqual([['[WARN] Completion attempt failed, retrying {"attempt":1}']]);
    expect(log.mock.calls).toEqual([['[INFO] done']]);
    expect(error.mock.calls).toEqual([['[ERROR] Analysis failed {"stage":"classifying"}']]);
  });

  it('should stay silent by default', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    provider.error('quiet failure');

    expect(spy).not.toHaveBeenCalled();
  });

  it('should not print events it drops', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    new ConsoleLogProvider({ outputToConsole: true, minLevel: 'error' }).info('skipped');

    expect(spy).not.toHaveBeenCalled();
  });

  // --- maxBufferedEvents ---

  it('should keep only the newest events when bounded', () => {
    const bounded = new ConsoleLogProvider({ maxBufferedEvents: 2 });
    bounded.info('one');
    bounded.info('two');
    bounded.info('three');

    expect(bounded.events.map((e) => e.message)).toEqual(['two', 'three']);
  });

  // --- formatLogLine() ---

  it('should omit empty fields from a formatted line', () => {
    expect(formatLogLine({ level: 'debug', message: 'Reviews filtered', fields: {} })).toBe(
      '[DEBUG] Reviews filtered'
    );
  });

  // --- flush() / clear() ---

  it('should resolve flush without touching the buffer', async () => {
    provider.info('kept');
    await expect(provider.flush()).resolves.toBeUndefined();
    expect(provider.events).toHaveLength(1);
  });

  it('should empty the buffer on clear', () => {
    provider.info('one');
    provider.clear();

    expect(provider.events).toEqual([]);
  });
});
