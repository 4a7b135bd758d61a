import { beforeEach, describe, expect, it } from 'vitest';
import { RequestFailed, ResponseParseError, ValidationError } from '../errors';
import type { ApplicantInput } from '../schemas/applicant-schema';
import { MockTransport } from '../transport/MockTransport';
import { encodeApplicant } from '../xml/applicant-encoder';
import { childText, rootElement } from '../xml/response-parser';
import { ScreenRequestBuilder, submitReports } from './ReportSubmitter';
import type { ExchangeContext } from './types';

const credential = { username: 'test-user', password: 'p&ss<word' };
const target = { account: 'ABC123', postBackUrl: 'https://hooks.example.com/screen?x=1&y=2' };

const first: ApplicantInput = {
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
const second: ApplicantInput = { ...first, applicantId: 'A2', firstName: 'Kim', packageId: 2 };

describe('ReportSubmitter', () => {
  let transport: MockTransport;
  let context: ExchangeContext;

  beforeEach(() => {
    transport = new MockTransport();
    context = {
      transport,
      servers: { Testing: 'https://screening-test.example.com/', Production: 'https://screening.example.com' },
    };
    transport.setResponse('/BatchScreensXML.cfm', {
      status: 200,
      body: '<ScreenResponse><Status>Received</Status></ScreenResponse>',
    });
  });

  it('posts the full envelope once to the submit endpoint', async () => {
    const response = await submitReports(context, 'Testing', credential, target, [first]);

    expect(transport.getCalls()).toHaveLength(1);
    expect(transport.getLastCall()).toEqual({
      url: 'https://screening-test.example.com/BatchScreensXML.cfm',
      body:
        '<ScreenRequest><PartnerInfo><UserName>test-user</UserName><Password>p&amp;ss&lt;word</Password></PartnerInfo>' +
        "<Account><AcctNbr>ABC123</AcctNbr><PostBackURL CredentialType='NONE'>https://hooks.example.com/screen?x=1&amp;y=2</PostBackURL>" +
        `${encodeApplicant(first)}</Account></ScreenRequest>`,
    });

    const root = rootElement(response.document);
    expect(response.status).toBe(200);
    expect(response.raw).toBe('<ScreenResponse><Status>Received</Status></ScreenResponse>');
    expect(root?.name).toBe('ScreenResponse');
    expect(root ? childText(root.element, 'Status') : undefined).toBe('Received');
  });

  it('selects the production server', async () => {
    await submitReports(context, 'Production', credential, target, [first]);

    expect(transport.getLastCall()?.url).toBe('https://screening.example.com/BatchScreensXML.cfm');
  });

  it('batches applicants from an async source into a single request, in order', async () => {
    async function* arriving(): AsyncGenerator<ApplicantInput> {
      yield first;
      yield second;
    }

    await submitReports(context, 'Testing', credential, target, arriving());

    const body = transport.getLastCall()?.body ?? '';
    expect(transport.getCalls()).toHaveLength(1);
    expect(body).toContain(`${encodeApplicant(first)}${encodeApplicant(second)}</Account>`);
  });

  it('collects applicants incrementally with the builder', async () => {
    const builder = new ScreenRequestBuilder(target);
    builder.add(first);
    expect(builder.size).toBe(1);
    builder.add(second);

    await builder.send(context, 'Testing', credential);

    expect(transport.getLastCall()?.body).toBe(builder.build(credential));
  });

  it('raises RequestFailed with status and body on a non-200 response', async () => {
    transport.setResponse('/BatchScreensXML.cfm', { status: 500, body: 'Internal error' });

    const attempt = submitReports(context, 'Testing', credential, target, [first]);

    await expect(attempt).rejects.toBeInstanceOf(RequestFailed);
    await expect(attempt).rejects.toMatchObject({ status: 500, body: 'Internal error' });
    expect(transport.getCalls()).toHaveLength(1);
  });

  it('wraps transport failures in RequestFailed without a status', async () => {
    transport.enqueue(new Error('socket hang up'));

    const attempt = submitReports(context, 'Testing', credential, target, [first]);

    await expect(attempt).rejects.toBeInstanceOf(RequestFailed);
    await expect(attempt).rejects.toMatchObject({
      status: undefined,
      message: 'Transport failure for https://screening-test.example.com/BatchScreensXML.cfm: socket hang up',
    });
  });

  it('raises ResponseParseError when a 200 body is not XML', async () => {
    transport.setResponse('/BatchScreensXML.cfm', { status: 200, body: '<ScreenResponse>' });

    await expect(submitReports(context, 'Testing', credential, target, [first])).rejects.toBeInstanceOf(
      ResponseParseError
    );
  });

  it('rejects a bad account or post-back URL before sending', async () => {
    await expect(
      submitReports(context, 'Testing', credential, { ...target, account: 'ABC' }, [first])
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      submitReports(context, 'Testing', credential, { ...target, postBackUrl: 'hooks/screen' }, [first])
    ).rejects.toBeInstanceOf(ValidationError);

    expect(transport.getCalls()).toHaveLength(0);
  });

  it('sends nothing when any applicant is invalid', async () => {
    await expect(
      submitReports(context, 'Testing', credential, target, [first, { ...second, postalCode: '123' }])
    ).rejects.toBeInstanceOf(ValidationError);

    expect(transport.getCalls()).toHaveLength(0);
  });

  it('refuses an empty batch', async () => {
    await expect(submitReports(context, 'Testing', credential, target, [])).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});
