/**
 * Response schemas for the emails API
 */
import { z } from 'zod';
import { UnexpectedResponseError } from '../../errors/categories.js';
import type {
  CreateBatchResponse,
  CreateEmailResponse,
  Email,
  EmailMutationResponse,
  EmailPage,
} from '../../types/email.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const AddressListSchema = z.array(z.string());

export const CreateEmailResponseSchema: Schema<CreateEmailResponse> = z.object({
  id: z.string().min(1),
});

export const CreateBatchResponseSchema: Schema<CreateBatchResponse> = z.object({
  data: z.array(z.object({ id: z.string().min(1) })),
});

export const EmailSchema: Schema<Email> = z.object({
  object: z.literal('email'),
  id: z.string(),
  from: z.string(),
  to: AddressListSchema,
  subject: z.string(),
  created_at: z.string(),
  html: z.string().nullish(),
  text: z.string().nullish(),
  cc: AddressListSchema.nullish(),
  bcc: AddressListSchema.nullish(),
  reply_to: AddressListSchema.nullish(),
  scheduled_at: z.string().nullish(),
  last_event: z
    .enum([
      'scheduled',
      'queued',
      'sent',
      'delivered',
      'delivery_delayed',
      'bounced',
      'complained',
      'opened',
      'clicked',
      'canceled',
      'failed',
    ])
    .optional(),
  tags: z.array(z.object({ name: z.string(), value: z.string() })).optional(),
});

export const EmailPageSchema: Schema<EmailPage> = z.object({
  data: z.array(EmailSchema),
  cursor: z
    .string()
    .nullish()
    .transform((cursor) => (cursor ? cursor : undefined)),
});

export const EmailMutationResponseSchema: Schema<EmailMutationResponse> = z.object({
  object: z.literal('email'),
  id: z.string(),
});

/**
 * Checks a response body against its schema
 */
export function parseResponse<T>(schema: Schema<T>, data: unknown, operation: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new UnexpectedResponseError(`${operation} returned an unexpected response: ${issues}`, 200, {
      issues,
    });
  }
  return result.data;
}
