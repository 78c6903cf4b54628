import express from 'express';
import * as nodesController from '../controllers/nodes';

const router = express.Router();

router.get('/', nodesController.getAllNodes);

export default router;
