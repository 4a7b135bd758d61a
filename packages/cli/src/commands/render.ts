import type { DownloadResult, StatusResult, ValidationIssue } from '@bgscreen/core';

export function describeStatus(result: StatusResult): string {
  const fileNo = result.fileNo || '(no file number)';
  if (result.errorText !== undefined) {
    return `${fileNo}: error - ${result.errorText}`;
  }
  if (result.status) {
    return `${fileNo}: ${result.status}`;
  }
  return `${fileNo}: no status reported`;
}

export function describeDownload(result: DownloadResult): string {
  if (result.outcome === 'written') {
    return `${result.fileNo}: written to ${result.path}`;
  }
  return `${result.fileNo}: ${result.reason} failure - ${result.error}`;
}

export function describeIssues(fileLabel: string, issues: ValidationIssue[]): string[] {
  return issues.map(issue => `${fileLabel} [${issue.path}]: ${issue.message}`);
}
