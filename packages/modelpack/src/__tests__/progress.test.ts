import { describe, it, expect } from 'vitest';
import { ProgressReporter, describeProgress, formatMegabytes } from '../download/progress.js';
import type { DownloadProgress } from '../download/types.js';
import { createCapturingLogger } from './helpers.js';

const MB = 1024 * 1024;

describe('describeProgress', () => {
  it('should include percentage when the total is known', () => {
    expect(describeProgress('https://example.com/m', 25 * MB, 100 * MB)).toEqual({
      url: 'https://example.com/m',
      bytesTransferred: 25 * MB,
      totalBytes: 100 * MB,
      percent: 25,
      message: '25.0 MB / 100.0 MB (25%)',
    });
  });

  it('should report bytes only without a total', () => {
    const progress = describeProgress('https://example.com/m', 1.5 * MB, null);
    expect(progress.percent).toBeNull();
    expect(progress.message).toBe('1.5 MB downloaded');
  });

  it('should format megabytes with one decimal', () => {
    expect(formatMegabytes(0)).toBe('0.0 MB');
    expect(formatMegabytes(3 * MB + MB / 4)).toBe('3.3 MB');
  });
});

describe('ProgressReporter', () => {
  it('should emit at most once per interval', () => {
    let now = 0;
    const events: DownloadProgress[] = [];
    const capture = createCapturingLogger('info');
    const reporter = new ProgressReporter(
      'https://example.com/m',
      10 * MB,
      capture.logger,
      5000,
      (p) => events.push(p),
      () => now,
    );

    now = 1000;
    reporter.update(1 * MB);
    now = 5000;
    reporter.update(2 * MB);
    now = 6000;
    reporter.update(3 * MB);
    now = 10_000;
    reporter.update(10 * MB);

    expect(events.map((e) => e.message)).toEqual([
      '2.0 MB / 10.0 MB (20%)',
      '10.0 MB / 10.0 MB (100%)',
    ]);
    expect(capture.messages()).toEqual([
      'Downloading: 2.0 MB / 10.0 MB (20%)',
      'Downloading: 10.0 MB / 10.0 MB (100%)',
    ]);
  });
});
