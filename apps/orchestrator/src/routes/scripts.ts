import express from 'express';
import * as scriptsController from '../controllers/scripts';
import { scriptLimiter } from '../middleware/rateLimiter';
import { validateRequest } from '../middleware/validateRequest';
import { scriptPushRequestSchema, scriptRunRequestSchema } from '../validators/scriptValidator';

const router = express.Router();

router.use(scriptLimiter);

// Upload (and optionally run) scripts
router.post('/push', validateRequest(scriptPushRequestSchema, 'body'), scriptsController.pushScripts);

// Run scripts already present on the nodes
router.post('/run', validateRequest(scriptRunRequestSchema, 'body'), scriptsController.runScripts);

export default router;
