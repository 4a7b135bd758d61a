/**
 * Applicant Encoder
 *
 * Validates an applicant and renders the vendor's `<Applicant>` fragment.
 * The vendor parser is positional: APPLICANT_ELEMENTS order is part of the
 * wire format.
 */

import {
  ApplicantSchema,
  type ApplicantInput,
  type ApplicantRecord,
} from '../schemas/applicant-schema';
import { parseOrThrow } from '../schemas/schema-validator';
import { xmlElement } from './escape';

export const APPLICANT_ELEMENTS = [
  'ApplicantID',
  'Package',
  'ReportCopy',
  'FirstName',
  'MiddleName',
  'LastName',
  'BirthDate',
  'SSN',
  'Phone',
  'Email',
  'DLNumber',
  'DLState',
  'Street',
  'Unit',
  'City',
  'State',
  'Zip',
  'WorkState',
] as const;

export type ApplicantElement = (typeof APPLICANT_ELEMENTS)[number];

export function digitsOnly(value: string): string {
  return value.replace(/\D/g, '');
}

/**
 * Ten digits become `###-###-####`; anything else is returned as the bare
 * digit string, even when empty.
 */
export function normalizePhone(phone: string | undefined): string {
  const digits = digitsOnly(phone ?? '');
  if (digits.length !== 10) {
    return digits;
  }
  return `${digits.slice(0, 3)}-${digits.slice(3, 6)}-${digits.slice(6)}`;
}

export function createApplicantRecord(input: ApplicantInput): ApplicantRecord {
  return parseOrThrow(ApplicantSchema, input, `applicant record "${input.applicantId}"`);
}

function applicantValues(record: ApplicantRecord): Record<ApplicantElement, string | number | undefined> {
  return {
    ApplicantID: record.applicantId,
    Package: record.packageId,
    ReportCopy: record.requestCopy ? 'YES' : 'NO',
    FirstName: record.firstName,
    MiddleName: record.middleName,
    LastName: record.lastName,
    BirthDate: record.birthDate,
    SSN: digitsOnly(record.ssn),
    Phone: normalizePhone(record.phone),
    Email: record.email,
    DLNumber: record.licenseNumber,
    DLState: record.licenseState || undefined,
    Street: record.street,
    Unit: record.unit,
    City: record.city,
    State: record.stateCode,
    Zip: record.postalCode,
    WorkState: record.workStateCode,
  };
}

/**
 * Throws ValidationError before rendering anything if the record breaks a
 * field constraint.
 */
export function encodeApplicant(input: ApplicantInput): string {
  const values = applicantValues(createApplicantRecord(input));
  const body = APPLICANT_ELEMENTS.map(name => xmlElement(name, values[name])).join('');
  return `<Applicant>${body}</Applicant>`;
}
