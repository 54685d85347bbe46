import { z } from 'zod';
import { parseIdentifier } from './identifier.js';

const identifierField = z
  .string({ required_error: 'Please enter mobile number or email' })
  .max(255)
  .transform((value, ctx) => {
    const result = parseIdentifier(value);
    if (!result.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error });
      return z.NEVER;
    }
    return result.identifier.value;
  });

export function otpCodeField(length: number) {
  return z
    .string({ required_error: 'OTP is required' })
    .trim()
    .regex(/^\d+$/, 'OTP must contain only digits')
    .length(length, `OTP must be exactly ${length} digits`);
}

export const loginSchema = z.object({
  identifier: identifierField,
});

export function createVerifyOtpSchema(length: number) {
  return z.object({
    code: otpCodeField(length),
  });
}

export const resendOtpSchema = z.object({
  identifier: identifierField.optional(),
});

export type LoginInput = z.infer<typeof loginSchema>;
export type VerifyOtpInput = z.infer<ReturnType<typeof createVerifyOtpSchema>>;
export type ResendOtpInput = z.infer<typeof resendOtpSchema>;
