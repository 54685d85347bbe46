import type { ProfileFields, ProfileRecord, Repositories, Store } from '../../repositories/types.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { AuthState, NEXT_ROUTE } from '../../utils/constants.js';
import { logger } from '../../utils/logger.js';
import { authStateMachine } from '../../utils/stateMachine.js';
import { validateProfile } from './profile.validation.js';

function parseFields(input: unknown): ProfileFields {
  const result = validateProfile(input);
  if (!result.success) {
    throw AppError.badRequest('Please correct the highlighted fields', ErrorCode.VALIDATION_ERROR, {
      fields: result.errors,
    });
  }
  return result.data;
}

export type ProfileService = ReturnType<typeof createProfileService>;

export function createProfileService({ store }: { store: Store }) {
  /**
   * Profile row and user names commit together. Anything the store throws
   * other than our own operational errors becomes PROFILE_SAVE_FAILED.
   */
  async function save(
    userId: string,
    action: string,
    write: (tx: Repositories) => Promise<ProfileRecord>,
  ): Promise<ProfileRecord> {
    try {
      return await store.transaction(write);
    } catch (error) {
      if (error instanceof AppError && error.isOperational) throw error;
      logger.error(`Profile ${action} failed`, { userId, error });
      throw AppError.internal('Error saving profile. Please try again.', ErrorCode.PROFILE_SAVE_FAILED);
    }
  }

  return {
    async completeProfile(userId: string, input: unknown) {
      const fields = parseFields(input);

      if (await store.profiles.findByUserId(userId)) {
        throw AppError.conflict('Profile already completed', ErrorCode.PROFILE_EXISTS);
      }
      authStateMachine.assertTransition(AuthState.PROFILE_INCOMPLETE, AuthState.PROFILE_COMPLETE);

      const profile = await save(userId, 'completion', async (tx) => {
        const created = await tx.profiles.create(userId, fields);
        const user = await tx.users.updateNames(userId, fields.firstName, fields.lastName);
        if (!user) throw AppError.unauthorized('User not found', ErrorCode.TOKEN_INVALID);
        return created;
      });

      logger.info('Profile completed', { userId });
      return {
        profile,
        state: AuthState.PROFILE_COMPLETE,
        next: NEXT_ROUTE[AuthState.PROFILE_COMPLETE],
        message: 'Profile completed successfully!',
      };
    },

    async getProfile(userId: string): Promise<ProfileRecord> {
      const profile = await store.profiles.findByUserId(userId);
      if (!profile) {
        throw AppError.forbidden('Please complete your profile first', ErrorCode.PROFILE_REQUIRED);
      }
      return profile;
    },

    async updateProfile(userId: string, input: unknown): Promise<ProfileRecord> {
      const fields = parseFields(input);

      const profile = await save(userId, 'update', async (tx) => {
        const updated = await tx.profiles.update(userId, fields);
        if (!updated) {
          throw AppError.forbidden('Please complete your profile first', ErrorCode.PROFILE_REQUIRED);
        }
        await tx.users.updateNames(userId, fields.firstName, fields.lastName);
        return updated;
      });

      logger.info('Profile updated', { userId });
      return profile;
    },
  };
}
