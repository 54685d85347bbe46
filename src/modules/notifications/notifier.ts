import { IdentifierType } from '../../utils/constants.js';
import { classifyIdentifier } from '../auth/identifier.js';
import { logger } from '../../utils/logger.js';
import { maskIdentifier } from '../../utils/helpers.js';
import { sendOtpEmail } from './email.service.js';
import { sendOtpSms } from './sms.service.js';

/**
 * Delivers an OTP to a mobile number or e-mail address.
 * Resolves to `false` on any transport failure, never rejects.
 */
export interface Notifier {
  send(identifier: string, code: string): Promise<boolean>;
}

export interface OtpTransports {
  email: (to: string, code: string) => Promise<void>;
  sms: (to: string, code: string) => Promise<void>;
}

const defaultTransports: OtpTransports = { email: sendOtpEmail, sms: sendOtpSms };

export function createNotifier(transports: OtpTransports = defaultTransports): Notifier {
  return {
    async send(identifier, code) {
      const type = classifyIdentifier(identifier);
      try {
        if (type === IdentifierType.EMAIL) {
          await transports.email(identifier, code);
        } else {
          await transports.sms(identifier, code);
        }
        return true;
      } catch (error) {
        logger.error(`Failed to send ${type} OTP`, {
          to: maskIdentifier(identifier),
          error: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    },
  };
}
