import { Router } from 'express';
import { pulseController } from '../controllers/pulse.controller.js';
import { validateBody, validateQuery, schemas } from '../middleware/validation.js';
import { asyncHandler } from '../utils/asyncHandler.js';

const router = Router();

// Hourly global snapshot
router.get('/global', validateQuery(schemas.globalQuery), asyncHandler(pulseController.getGlobal));

// Per-user overlay
router.get('/users/:userId/personal', validateQuery(schemas.personalQuery), asyncHandler(pulseController.getPersonal));
router.get('/users/:userId/today', validateQuery(schemas.personalQuery), asyncHandler(pulseController.getToday));
router.post('/users/:userId/feedback', validateBody(schemas.feedback), asyncHandler(pulseController.submitFeedback));

// Manual generation trigger
router.post('/generate', validateBody(schemas.generate), asyncHandler(pulseController.generate));

export default router;
