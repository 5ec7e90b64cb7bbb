import { describe, it, expect } from '@jest/globals';

import {
  PipelineError,
  EphemerisDownloadError,
  EphemerisUnavailableError,
  DecompressionError,
  ToolConfigurationError,
  ToolExecutionError,
  ToolTimeoutError,
  DistributionError,
  isPipelineError,
} from '../index.js';

describe('pipeline errors', () => {
  it('every error carries its kind and class name', () => {
    const errors: PipelineError[] = [
      new EphemerisDownloadError('https://a.test/x', 'http_status', 'HTTP 404'),
      new EphemerisUnavailableError([]),
      new DecompressionError('/tmp/x.gz'),
      new ToolConfigurationError('/opt/tool', 'not found'),
      new ToolExecutionError(2, 'bad ephemeris'),
      new ToolTimeoutError(300_000),
      new DistributionError('/media/sd', 'not accessible'),
    ];

    expect(errors.map((e) => e.kind)).toEqual([
      'ephemeris_download',
      'ephemeris_unavailable',
      'decompression',
      'tool_configuration',
      'tool_execution',
      'tool_timeout',
      'distribution',
    ]);
    expect(errors.map((e) => e.name)).toEqual([
      'EphemerisDownloadError',
      'EphemerisUnavailableError',
      'DecompressionError',
      'ToolConfigurationError',
      'ToolExecutionError',
      'ToolTimeoutError',
      'DistributionError',
    ]);
    for (const e of errors) {
      expect(e).toBeInstanceOf(Error);
      expect(isPipelineError(e)).toBe(true);
    }
  });

  it('EphemerisUnavailableError lists every attempt', () => {
    const err = new EphemerisUnavailableError([
      { url: 'https://a.test/1', reason: 'HTTP 404' },
      { url: 'https://a.test/2', reason: 'too small' },
    ]);
    expect(err.attempts).toHaveLength(2);
    expect(err.message).toBe(
      'no usable ephemeris file after 2 attempt(s): https://a.test/1 (HTTP 404); https://a.test/2 (too small)',
    );
  });

  it('ToolExecutionError keeps the captured stderr', () => {
    const err = new ToolExecutionError(1, 'ERROR: Invalid file name.\n');
    expect(err.exitCode).toBe(1);
    expect(err.stderr).toBe('ERROR: Invalid file name.\n');
    expect(err.message).toBe('signal tool exited with code 1: ERROR: Invalid file name.');
  });

  it('isPipelineError rejects plain errors', () => {
    expect(isPipelineError(new Error('x'))).toBe(false);
    expect(isPipelineError('x')).toBe(false);
  });
});
