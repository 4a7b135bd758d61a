import { z } from 'zod';

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const SSN_PATTERN = /^(\d{9}|\d{3}-\d{2}-\d{4})$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Accepts a Date (UTC calendar components are used) or a `YYYY-MM-DD` string
 * naming a real date, and normalizes both to `YYYY-MM-DD`.
 */
const BirthDateSchema = z
  .union([z.date(), z.string()], {
    errorMap: () => ({ message: 'birthDate must be a date or a YYYY-MM-DD string' }),
  })
  .transform((value, ctx) => {
    if (value instanceof Date) {
      return `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1, 2)}-${pad(value.getUTCDate(), 2)}`;
    }

    const match = CALENDAR_DATE.exec(value.trim());
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'birthDate must be formatted as YYYY-MM-DD' });
      return z.NEVER;
    }

    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const probe = new Date(Date.UTC(year, month - 1, day));
    if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `birthDate ${value} is not a calendar date` });
      return z.NEVER;
    }
    return match[0];
  });

export const PackageIdSchema = z.union([z.literal(1), z.literal(2)], {
  errorMap: () => ({ message: 'packageId must be 1 or 2' }),
});

export const ApplicantSchema = z.object({
  applicantId: z
    .string()
    .min(1, 'applicantId is required')
    .max(50, 'applicantId must be at most 50 characters'),
  packageId: PackageIdSchema,
  requestCopy: z.boolean().default(false),
  firstName: z
    .string()
    .min(1, 'firstName is required')
    .max(20, 'firstName must be at most 20 characters'),
  middleName: z.string().max(20, 'middleName must be at most 20 characters').optional(),
  lastName: z
    .string()
    .min(1, 'lastName is required')
    .max(25, 'lastName must be at most 25 characters'),
  birthDate: BirthDateSchema,
  ssn: z.string().regex(SSN_PATTERN, 'ssn must be 9 digits, optionally grouped as ###-##-####'),
  // Normalized at encode time; malformed numbers pass through as bare digits
  phone: z.string().optional(),
  email: z.string().max(255, 'email must be at most 255 characters').optional(),
  licenseNumber: z.string().max(30, 'licenseNumber must be at most 30 characters').optional(),
  licenseState: z
    .string()
    .refine(value => value === '' || value.length === 2, 'licenseState must be exactly 2 characters')
    .optional(),
  street: z.string().max(40, 'street must be at most 40 characters'),
  unit: z.string().optional(),
  city: z.string().max(25, 'city must be at most 25 characters'),
  stateCode: z.string().length(2, 'stateCode must be exactly 2 characters'),
  postalCode: z.string().length(5, 'postalCode must be exactly 5 characters'),
  workStateCode: z.string().min(1, 'workStateCode is required'),
});

/** Caller-side shape: defaults optional, birthDate as Date or string */
export type ApplicantInput = z.input<typeof ApplicantSchema>;

/** Validated shape: birthDate normalized to YYYY-MM-DD, requestCopy filled */
export type ApplicantRecord = z.output<typeof ApplicantSchema>;

export type PackageId = z.infer<typeof PackageIdSchema>;

function unwrapApplicantList(data: unknown): unknown {
  if (typeof data === 'object' && data !== null && !Array.isArray(data) && 'applicants' in data) {
    return data.applicants;
  }
  return data;
}

/**
 * A bare list of applicants, or `{ applicants: [...] }`
 */
export const ApplicantListSchema = z.preprocess(
  unwrapApplicantList,
  z.array(ApplicantSchema).min(1, 'at least one applicant is required')
);
