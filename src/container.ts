import { env, otpConfig, type OtpConfig } from './config/env.js';
import { createStore } from './repositories/index.js';
import type { Store } from './repositories/types.js';
import { createAuthService, type AuthService } from './modules/auth/auth.service.js';
import { createTokenService, type TokenService } from './modules/auth/tokens.js';
import { createNotifier, type Notifier } from './modules/notifications/notifier.js';
import { createProfileService, type ProfileService } from './modules/profile/profile.service.js';

export interface Container {
  store: Store;
  notifier: Notifier;
  auth: AuthService;
  profiles: ProfileService;
  tokens: TokenService;
  otp: OtpConfig;
}

export interface ContainerOverrides {
  store?: Store;
  notifier?: Notifier;
  otp?: Partial<OtpConfig>;
}

/**
 * Wires services to the configured store and notifier.
 */
export function createContainer(overrides: ContainerOverrides = {}): Container {
  const store = overrides.store ?? createStore();
  const notifier = overrides.notifier ?? createNotifier();
  const config: OtpConfig = { ...otpConfig, ...overrides.otp };

  return {
    store,
    notifier,
    auth: createAuthService({ store, notifier, config, bcryptRounds: env.BCRYPT_ROUNDS }),
    profiles: createProfileService({ store }),
    tokens: createTokenService({
      accessSecret: env.JWT_ACCESS_SECRET,
      accessExpiryMinutes: env.JWT_ACCESS_EXPIRY_MINUTES,
      pendingSecret: env.JWT_PENDING_SECRET,
      pendingExpiryMinutes: config.expiryMinutes,
    }),
    otp: config,
  };
}
