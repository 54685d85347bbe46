import { RequestHandler, Router } from 'express';
import type { ProfileController } from './profile.controller.js';

export function createProfileRoutes(
  controller: ProfileController,
  { authenticate, requireProfile }: { authenticate: RequestHandler; requireProfile: RequestHandler },
): Router {
  const router = Router();

  router.use(authenticate);

  // Field validation happens in the service so errors come back per field
  router.post('/complete', controller.complete);
  router.get('/', requireProfile, controller.show);
  router.put('/', requireProfile, controller.update);

  return router;
}
