import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import sgMail from '@sendgrid/mail';
import Handlebars from 'handlebars';
import { env } from '../../config/env.js';
import { logger } from '../../utils/logger.js';
import { maskIdentifier } from '../../utils/helpers.js';

const useSendGridApi = env.EMAIL_PROVIDER === 'sendgrid_api';

if (useSendGridApi) {
  sgMail.setApiKey(env.SENDGRID_API_KEY);
}

const transporter: Transporter | null = useSendGridApi
  ? null
  : nodemailer.createTransport({
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      secure: env.SMTP_PORT === 465,
      auth: {
        user: env.SMTP_USER,
        pass: env.SMTP_PASS,
      },
    });

const otpTemplate = Handlebars.compile(`
  <div style="font-family: Arial, sans-serif; max-width: 500px; margin: 0 auto; padding: 20px;">
    <div style="padding: 30px; background: #f9f9f9; border-radius: 8px;">
      <h2>Your Login OTP</h2>
      <p>Your OTP is:</p>
      <div style="text-align: center; padding: 20px; background: white; border-radius: 8px; margin: 20px 0;">
        <span style="font-size: 32px; font-weight: bold; letter-spacing: 8px;">{{otp}}</span>
      </div>
      <p style="color: #666;">This OTP will expire in {{expiryMinutes}} minutes. Do not share it with anyone.</p>
    </div>
  </div>
`);

const otpTextTemplate = Handlebars.compile(
  'Your OTP is: {{otp}}\n\nThis OTP will expire in {{expiryMinutes}} minutes.',
);

async function sendWithProvider(to: string, subject: string, html: string, text: string): Promise<void> {
  if (useSendGridApi) {
    await sgMail.send({
      to,
      from: {
        email: env.SMTP_FROM_EMAIL,
        name: env.SMTP_FROM_NAME,
      },
      subject,
      html,
      text,
    });
    return;
  }

  if (!transporter) {
    throw new Error('SMTP transporter is not configured');
  }

  await transporter.sendMail({
    to,
    from: `"${env.SMTP_FROM_NAME}" <${env.SMTP_FROM_EMAIL}>`,
    subject,
    html,
    text,
  });
}

/**
 * Throws on provider failure; the notifier turns that into `false`.
 */
export async function sendOtpEmail(to: string, otp: string): Promise<void> {
  const data = { otp, expiryMinutes: env.OTP_EXPIRY_MINUTES };
  await sendWithProvider(to, 'Your Login OTP', otpTemplate(data), otpTextTemplate(data));
  logger.info(`Email OTP sent to ${maskIdentifier(to)}`);
}
