import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LogManager, debug, error, header, info, setLogLevel, success, warn } from '../shared/ui/index.js';
import { stripAnsi } from '../shared/utils/text.js';

describe('LogManager', () => {
  let output: string[];

  beforeEach(() => {
    LogManager.resetInstance();
    output = [];
    LogManager.getInstance().setWriter((line) => output.push(stripAnsi(line)));
  });

  afterEach(() => {
    LogManager.resetInstance();
    vi.restoreAllMocks();
  });

  it('should show info and above by default', () => {
    debug('hidden');
    info('shown');

    expect(output).toEqual(['[INFO] shown']);
  });

  it('should filter messages below the current level', () => {
    setLogLevel('warn');

    info('hidden');
    warn('careful');
    error('broken');

    expect(output).toEqual(['[WARN] careful', '[ERROR] broken']);
  });

  it('should print debug messages at the debug level', () => {
    setLogLevel('debug');

    debug('details');

    expect(output).toEqual(['[DEBUG] details']);
  });

  it('should print success messages regardless of level', () => {
    setLogLevel('error');

    success('done');

    expect(output).toEqual(['done']);
  });

  it('should surround headers with blank lines', () => {
    header('Title');

    expect(output).toEqual(['', '=== Title ===', '']);
  });

  it('should write to the console once the writer is cleared', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    LogManager.getInstance().setWriter();

    warn('to console');

    expect(spy).toHaveBeenCalledOnce();
    expect(stripAnsi(String(spy.mock.calls[0]?.[0]))).toBe('[WARN] to console');
    expect(output).toEqual([]);
  });
});
