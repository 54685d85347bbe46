import { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { currentAuth } from '../../middleware/auth.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import type { ProfileService } from './profile.service.js';

export function createProfileController(profiles: ProfileService) {
  return {
    complete: asyncHandler(async (req: Request, res: Response) => {
      const { userId } = currentAuth(req);
      const result = await profiles.completeProfile(userId, req.body);
      res.status(201).json({ success: true, data: result });
    }),

    show: asyncHandler(async (req: Request, res: Response) => {
      if (!req.profile) {
        throw AppError.forbidden('Please complete your profile first', ErrorCode.PROFILE_REQUIRED);
      }
      res.json({ success: true, data: req.profile });
    }),

    update: asyncHandler(async (req: Request, res: Response) => {
      const { userId } = currentAuth(req);
      const profile = await profiles.updateProfile(userId, req.body);
      res.json({ success: true, data: profile });
    }),
  };
}

export type ProfileController = ReturnType<typeof createProfileController>;
