import { describe, expect, it } from 'vitest';
import { describeDownload, describeIssues, describeStatus } from './render';

describe('describeStatus', () => {
  it('prefers the vendor error', () => {
    expect(describeStatus({ fileNo: '1001', errorText: 'File not found' })).toBe('1001: error - File not found');
  });

  it('reports available and silent files', () => {
    expect(describeStatus({ fileNo: '1002', status: 'Available', rawStatusPayload: '' })).toBe('1002: Available');
    expect(describeStatus({ fileNo: '' })).toBe('(no file number): no status reported');
  });
});

describe('describeDownload', () => {
  it('describes both outcomes', () => {
    expect(describeDownload({ fileNo: 'F1', outcome: 'written', path: '/tmp/F1.pdf' })).toBe(
      'F1: written to /tmp/F1.pdf'
    );
    expect(
      describeDownload({ fileNo: 'F2', outcome: 'failed', reason: 'vendor', error: 'Report not ready' })
    ).toBe('F2: vendor failure - Report not ready');
  });
});

describe('describeIssues', () => {
  it('prefixes each issue with the file and path', () => {
    expect(
      describeIssues('applicants.yaml', [{ path: '0.ssn', message: 'ssn must be 9 digits' }])
    ).toEqual(['applicants.yaml [0.ssn]: ssn must be 9 digits']);
  });
});
