// ── Barrel Export for all models ──
export { User, type IUser } from './User.js';
export { Otp, type IOtp } from './Otp.js';
export { UserSession, type IUserSession } from './UserSession.js';
export { UserProfile, type IUserProfile } from './UserProfile.js';
