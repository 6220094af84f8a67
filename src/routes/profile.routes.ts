import { Router } from 'express';
import * as profileController from '../controllers/profile.controller';
import { validate, schemas } from '../middleware/validate';

const router = Router();

// Profiles are addressed by their unique name
router.get('/', profileController.getProfiles);
router.post('/', validate(schemas.createProfile), profileController.createProfile);
router.get('/:name', profileController.getProfile);
router.put('/:name', validate(schemas.updateProfile), profileController.updateProfile);
router.delete('/:name', profileController.deleteProfile);

export default router;
