import express from 'express';
import { apiKeyAuth } from '../middleware/apiKeyAuth';
import { apiLimiter } from '../middleware/rateLimiter';
import nodes from './nodes';
import provisioning from './provisioning';
import scripts from './scripts';

const router = express.Router();

// Apply API key authentication to all routes (if configured)
router.use(apiKeyAuth);
router.use(apiLimiter);

router.use('/nodes', nodes);
router.use('/provision', provisioning);
router.use('/scripts', scripts);

export default router;
