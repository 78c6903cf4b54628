import express from 'express';
import * as provisioningController from '../controllers/provisioning';
import { provisionLimiter } from '../middleware/rateLimiter';
import { validateRequest } from '../middleware/validateRequest';
import { provisionRequestSchema } from '../validators/provisioningValidator';

const router = express.Router();

router.post(
  '/',
  provisionLimiter,
  validateRequest(provisionRequestSchema, 'body'),
  provisioningController.provision
);

export default router;
