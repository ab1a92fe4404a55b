import { z } from 'zod';
import { CONTENT_SOURCES } from './types.js';

/** Pay is stored in 32-bit integer columns. */
export const MAX_STORED_PAY = 2_147_483_647;

const optionalText = z.string().min(1).optional();
const annualPay = z.number().int().nonnegative().max(MAX_STORED_PAY).optional();

export const parsedJobSchema = z
  .object({
    title: z.string().trim().min(1),
    employer: optionalText,
    url: optionalText,
    location: optionalText,
    payMin: annualPay,
    payMax: annualPay,
    jobCode: z.string().min(1).max(50).optional(),
    noLongerAccepting: z.boolean(),
    source: z.enum(CONTENT_SOURCES),
    rawText: z.string(),
  })
  .refine((job) => job.payMin === undefined || job.payMax === undefined || job.payMin <= job.payMax, {
    message: 'payMin must not exceed payMax',
    path: ['payMin'],
  });

export type ValidatedParsedJob = z.infer<typeof parsedJobSchema>;

export interface ValidateParsedJobsOptions {
  onInvalid?: (issues: z.ZodIssue[], job: unknown) => void;
}

export function validateParsedJobs(jobs: unknown[], options?: ValidateParsedJobsOptions): ValidatedParsedJob[] {
  const valid: ValidatedParsedJob[] = [];

  for (const job of jobs) {
    const result = parsedJobSchema.safeParse(job);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, job);
    }
  }

  return valid;
}
