import { describe, it, expect } from 'vitest';
import { buildReportText, buildSubject } from '../../src/notify/report.js';
import type { ExecutionSummary } from '../../src/types/index.js';

const START = Date.UTC(2026, 0, 5, 6, 0, 0);

function makeSummary(overrides: Partial<ExecutionSummary> = {}): ExecutionSummary {
  return {
    success: false,
    results: [
      { site: 'linkedin', success: true, durationMs: 1500 },
      {
        site: 'naukri',
        success: false,
        durationMs: 6000,
        error: 'Login failed: bad password',
        errorKind: 'LoginFailed',
      },
    ],
    startedAt: START,
    endedAt: START + 12_340,
    totalDurationMs: 12_340,
    ...overrides,
  };
}

describe('buildSubject', () => {
  it('marks successful runs', () => {
    expect(buildSubject({ success: true }, 'Profile Refresh')).toBe('✓ Profile Refresh - Success');
  });

  it('marks failed runs', () => {
    expect(buildSubject({ success: false }, 'Profile Refresh')).toBe('✗ Profile Refresh - Partial Failure');
  });
});

describe('buildReportText', () => {
  it('lists every site in run order', () => {
    expect(buildReportText(makeSummary())).toBe(
      [
        '✗ PROFILE REFRESH SUMMARY',
        '='.repeat(50),
        '',
        'Start Time: 2026-01-05T06:00:00.000Z',
        'End Time: 2026-01-05T06:00:12.340Z',
        'Total Duration: 12.34s',
        '',
        'SITE RESULTS:',
        '',
        'linkedin: ✓ Success',
        '  Duration: 1500ms',
        '',
        'naukri: ✗ Failed [LoginFailed]',
        '  Error: Login failed: bad password',
        '',
        '='.repeat(50),
        'This is an automated notification.',
        '',
      ].join('\n'),
    );
  });

  it('falls back to Unknown for a failure without a message', () => {
    const text = buildReportText(
      makeSummary({ results: [{ site: 'System', success: false, durationMs: 0 }] }),
    );

    expect(text).toContain('System: ✗ Failed\n  Error: Unknown\n');
  });

  it('marks a fully successful run', () => {
    const text = buildReportText(makeSummary({ success: true, results: [] }));
    expect(text.split('\n')[0]).toBe('✓ PROFILE REFRESH SUMMARY');
  });
});
