import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RequestFailed, ValidationError } from './errors';
import type { ApplicantInput } from './schemas/applicant-schema';
import { ScreeningClient } from './ScreeningClient';
import { MockTransport } from './transport/MockTransport';

const applicant: ApplicantInput = {
  applicantId: 'A1',
  packageId: 1,
  firstName: 'Jo',
  lastName: 'Smith',
  birthDate: '1990-01-15',
  ssn: '123-45-6789',
  street: '1 Elm St',
  city: 'Ames',
  stateCode: 'IA',
  postalCode: '50010',
  workStateCode: 'IA',
};

describe('ScreeningClient', () => {
  let transport: MockTransport;
  let tmpDir: string;
  let client: ScreeningClient;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bgscreen-client-'));
    transport = new MockTransport();
    client = new ScreeningClient({
      config: {
        environment: 'Testing',
        servers: { Testing: 'https://screening-test.example.com' },
        account: 'ABC123',
        postBackUrl: 'https://hooks.example.com/done',
        outputDirectory: tmpDir,
      },
      credential: { username: 'test-user', password: 'test-secret' },
      transport,
    });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('submits with the configured account and post-back URL', async () => {
    transport.setDefaultResponse({ status: 200, body: '<ScreenResponse/>' });

    await client.submit([applicant]);

    expect(transport.getLastCall()?.body).toContain(
      "<AcctNbr>ABC123</AcctNbr><PostBackURL CredentialType='NONE'>https://hooks.example.com/done</PostBackURL>"
    );
  });

  it('masks the password when a server error body echoes it', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    transport.setDefaultResponse({ status: 500, body: 'bad login for test-user/test-secret' });

    await expect(client.submit([applicant])).rejects.toBeInstanceOf(RequestFailed);

    const logged = errorSpy.mock.calls.map(call => String(call[0]));
    expect(logged.some(line => line.endsWith('bad login for test-user/********'))).toBe(true);
    expect(logged.some(line => line.includes('test-secret'))).toBe(false);
    errorSpy.mockRestore();
  });

  it('lets a call override the account', async () => {
    transport.setDefaultResponse({ status: 200, body: '<ScreenResponse/>' });

    await client.submit([applicant], { account: 'ZZZ999' });

    expect(transport.getLastCall()?.body).toContain('<AcctNbr>ZZZ999</AcctNbr>');
  });

  it('previews a submission with the password masked and sends nothing', async () => {
    const preview = await client.previewSubmission([applicant]);

    expect(preview).toContain('<Password>********</Password>');
    expect(preview).not.toContain('test-secret');
    expect(preview.startsWith('<ScreenRequest>\n')).toBe(true);
    expect(transport.getCalls()).toHaveLength(0);
  });

  it('fails a submission when no account is configured', async () => {
    const unconfigured = new ScreeningClient({
      config: { servers: { Testing: 'https://screening-test.example.com' } },
      credential: { username: 'test-user', password: 'test-secret' },
      transport,
    });

    await expect(unconfigured.submit([applicant])).rejects.toBeInstanceOf(ValidationError);
  });

  it('downloads into the configured output directory by default', async () => {
    transport.setDefaultResponse({
      status: 200,
      body: `<ReportCopyResponse><ReportPDF>${Buffer.from('%PDF').toString('base64')}</ReportPDF></ReportCopyResponse>`,
    });

    const [result] = await client.downloadReports(['77']);

    expect(result).toEqual({ fileNo: '77', outcome: 'written', path: path.join(tmpDir, '77.pdf') });
  });

  it('fetches status through the status endpoint', async () => {
    transport.setResponse('/ReportStatusFetch.cfm', {
      status: 200,
      body: '<ReportStatusResponse><Report><FileNo>77</FileNo><ErrorText>Unknown file</ErrorText></Report></ReportStatusResponse>',
    });

    expect(await client.fetchStatus(['77'])).toEqual([{ fileNo: '77', errorText: 'Unknown file' }]);
  });

  it('rejects an invalid config at construction', () => {
    expect(
      () =>
        new ScreeningClient({
          config: { environment: 'Production', servers: { Testing: 'https://screening-test.example.com' } },
          credential: { username: 'test-user', password: 'test-secret' },
          transport,
        })
    ).toThrow(ValidationError);
  });
});
