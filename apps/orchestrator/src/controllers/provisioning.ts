import { Request, Response } from 'express';
import { logger } from '../utils/logger';
import { AppError } from '../middleware/errorHandler';
import type { FleetProvisioner } from '../services/fleetProvisioner';
import type { ProvisionRequest } from '../validators/provisioningValidator';

// Provisioner will be set by app.ts
let provisioner: FleetProvisioner | null = null;

function setProvisioner(instance: FleetProvisioner | null): void {
  provisioner = instance;
}

const provision = async (req: Request, res: Response): Promise<void> => {
  if (!provisioner) {
    throw new AppError('Provisioner not initialized', 500, 'NOT_INITIALIZED');
  }

  const body: ProvisionRequest = req.body;
  logger.info('Provisioning run requested', {
    only: body.only,
    hostOverride: body.hostOverride,
  });

  const report = await provisioner.provision(body);
  res.status(200).json(report);
};

export { setProvisioner, provision };
