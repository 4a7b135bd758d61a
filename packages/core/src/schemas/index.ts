export {
  ApplicantSchema,
  ApplicantListSchema,
  PackageIdSchema,
  type ApplicantInput,
  type ApplicantRecord,
  type PackageId,
} from './applicant-schema';

export {
  ClientConfigSchema,
  ServerEnvironmentSchema,
  type ClientConfig,
  type ClientConfigInput,
  type ServerDirectory,
  type ServerEnvironment,
} from './config-schema';

export {
  AccountSchema,
  CredentialSchema,
  FileNumberListSchema,
  FileNumberSchema,
  PostBackUrlSchema,
  SubmissionTargetSchema,
  type Credential,
  type SubmissionTarget,
} from './request-schema';

export {
  formatZodIssues,
  loadStructuredFile,
  parseOrThrow,
  validateApplicantsFile,
  validateConfigFile,
  type FileValidationResult,
} from './schema-validator';
