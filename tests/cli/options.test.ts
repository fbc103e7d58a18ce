import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadEnvOrExit, parseDateFormat, parseFormat, parseTimeout, reportError } from '../../src/cli/options.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseDateFormat', () => {
  it('should accept known formats', () => {
    expect(parseDateFormat('iso')).toBe('iso');
    expect(parseDateFormat('locale')).toBe('locale');
  });

  it('should reject unknown formats', () => {
    expect(() => parseDateFormat('dmy')).toThrow('Unknown date format "dmy" (expected iso, locale)');
  });
});

describe('parseFormat', () => {
  it('should reject unknown output formats', () => {
    expect(parseFormat('csv')).toBe('csv');
    expect(() => parseFormat('pdf')).toThrow('Unknown format "pdf" (expected xlsx, csv, json)');
  });
});

describe('parseTimeout', () => {
  it('should require a positive number', () => {
    expect(parseTimeout('5000')).toBe(5000);
    expect(() => parseTimeout('0')).toThrow('Timeout must be a positive number of milliseconds, got "0"');
  });
});

describe('reportError', () => {
  it('should print the message with the error prefix', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    reportError(new Error('bad file'), false);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[ERROR] bad file');
  });
});

describe('loadEnvOrExit', () => {
  it('should return the parsed environment', () => {
    expect(loadEnvOrExit({ TALLY_FORMAT: 'json' }).format).toBe('json');
  });

  it('should report invalid values and exit with status 1', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    expect(() => loadEnvOrExit({ TALLY_TIMEOUT_MS: '-1' })).toThrow('exit 1');
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringMatching(/^\[ERROR\] Invalid run configuration: timeoutMs: /));
  });
});
