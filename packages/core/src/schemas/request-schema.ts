import { z } from 'zod';

export const CredentialSchema = z.object({
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
});

export type Credential = z.infer<typeof CredentialSchema>;

export const AccountSchema = z.string().length(6, 'account must be exactly 6 characters');

export const PostBackUrlSchema = z.string().url('postBackUrl must be an absolute URL');

export const SubmissionTargetSchema = z.object({
  account: AccountSchema,
  postBackUrl: PostBackUrlSchema,
});

export type SubmissionTarget = z.infer<typeof SubmissionTargetSchema>;

export const FileNumberSchema = z
  .string()
  .trim()
  .min(1, 'file number must not be empty')
  .refine(value => !/[\\/]/.test(value), 'file number must not contain path separators');

export const FileNumberListSchema = z
  .array(FileNumberSchema)
  .min(1, 'at least one file number is required');
