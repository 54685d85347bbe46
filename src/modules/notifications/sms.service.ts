import axios from 'axios';
import { env } from '../../config/env.js';
import { logger } from '../../utils/logger.js';
import { maskIdentifier } from '../../utils/helpers.js';

const SMS_TIMEOUT_MS = 10_000;

function otpMessage(otp: string): string {
  return `Your OTP is: ${otp}. It expires in ${env.OTP_EXPIRY_MINUTES} minutes.`;
}

/**
 * Deliver an OTP by SMS.
 *
 * `log` writes the code to the application log for local development.
 * `http` posts `{ to, message }` as JSON to `SMS_GATEWAY_URL` with an optional
 * bearer token; any non-2xx answer is a failure.
 */
export async function sendOtpSms(mobile: string, otp: string): Promise<void> {
  if (env.SMS_PROVIDER === 'log') {
    logger.info(`SMS OTP sent to ${mobile}: ${otp}`);
    return;
  }

  if (!env.SMS_GATEWAY_URL) {
    throw new Error('SMS_GATEWAY_URL is not configured');
  }

  await axios.post(
    env.SMS_GATEWAY_URL,
    { to: mobile, message: otpMessage(otp) },
    {
      timeout: SMS_TIMEOUT_MS,
      headers: env.SMS_GATEWAY_TOKEN ? { Authorization: `Bearer ${env.SMS_GATEWAY_TOKEN}` } : {},
    },
  );
  logger.info(`SMS OTP sent to ${maskIdentifier(mobile)}`);
}
