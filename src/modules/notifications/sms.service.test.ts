import { afterEach, describe, expect, it, vi } from 'vitest';
import axios from 'axios';
import { env } from '../../config/env.js';
import { sendOtpSms } from './sms.service.js';

vi.mock('axios', () => ({
  default: { post: vi.fn() },
}));

describe('sendOtpSms', () => {
  const original = { ...env };

  afterEach(() => {
    Object.assign(env, original);
    vi.mocked(axios.post).mockReset();
  });

  it('only logs with the log provider', async () => {
    await sendOtpSms('+15551234567', '123456');
    expect(axios.post).not.toHaveBeenCalled();
  });

  it('posts the message to the gateway with the bearer token', async () => {
    Object.assign(env, {
      SMS_PROVIDER: 'http',
      SMS_GATEWAY_URL: 'http://sms.test/send',
      SMS_GATEWAY_TOKEN: 'test-token',
    });

    await sendOtpSms('+15551234567', '123456');

    expect(axios.post).toHaveBeenCalledWith(
      'http://sms.test/send',
      { to: '+15551234567', message: 'Your OTP is: 123456. It expires in 10 minutes.' },
      { timeout: 10_000, headers: { Authorization: 'Bearer test-token' } },
    );
  });

  it('fails when the gateway URL is missing', async () => {
    Object.assign(env, { SMS_PROVIDER: 'http', SMS_GATEWAY_URL: '' });
    await expect(sendOtpSms('+15551234567', '123456')).rejects.toThrow('SMS_GATEWAY_URL is not configured');
  });

  it('propagates gateway errors', async () => {
    Object.assign(env, { SMS_PROVIDER: 'http', SMS_GATEWAY_URL: 'http://sms.test/send' });
    vi.mocked(axios.post).mockRejectedValue(new Error('Request failed with status code 503'));
    await expect(sendOtpSms('+15551234567', '123456')).rejects.toThrow('status code 503');
  });
});
