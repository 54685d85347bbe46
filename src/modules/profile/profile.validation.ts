import { z } from 'zod';
import { DEFAULT_COUNTRY } from '../../utils/constants.js';
import type { ProfileFields } from '../../repositories/types.js';

const requiredText = (label: string, max: number) =>
  z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be text` })
    .trim()
    .min(1, `${label} is required`)
    .max(max, `${label} must be at most ${max} characters`);

const optionalText = (label: string, max: number) =>
  z
    .string({ invalid_type_error: `${label} must be text` })
    .trim()
    .max(max, `${label} must be at most ${max} characters`)
    .nullish();

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date of birth must be YYYY-MM-DD')
  .transform((value, ctx) => {
    const date = new Date(`${value}T00:00:00.000Z`);
    // Date rolls 2001-02-30 over to March; reject anything that does not read back unchanged
    if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Date of birth is not a real date' });
      return z.NEVER;
    }
    if (date.getTime() >= Date.now()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Date of birth must be in the past' });
      return z.NEVER;
    }
    return date;
  });

export const profileSchema = z.object({
  firstName: requiredText('First name', 50),
  lastName: requiredText('Last name', 50),
  addressLine1: requiredText('Address line 1', 255),
  addressLine2: optionalText('Address line 2', 255).transform((v) => v || null),
  city: requiredText('City', 100),
  state: requiredText('State', 100),
  postalCode: requiredText('Postal code', 20),
  country: optionalText('Country', 100).transform((v) => v || DEFAULT_COUNTRY),
  dateOfBirth: isoDate.nullish().transform((v) => v ?? null),
});

export type ProfileValidationResult =
  | { success: true; data: ProfileFields }
  | { success: false; errors: Record<string, string> };

/**
 * Per-field result: the first message for each failing field.
 */
export function validateProfile(input: unknown): ProfileValidationResult {
  const parsed = profileSchema.safeParse(input ?? {});
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }

  const errors: Record<string, string> = {};
  for (const issue of parsed.error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : '_form';
    errors[field] ??= issue.message;
  }
  return { success: false, errors };
}
