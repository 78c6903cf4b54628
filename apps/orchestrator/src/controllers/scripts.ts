import { Request, Response } from 'express';
import { AppError } from '../middleware/errorHandler';
import type { FleetScripts } from '../services/fleetScripts';
import type { ScriptPushRequest, ScriptRunRequest } from '../validators/scriptValidator';

let fleetScripts: FleetScripts | null = null;

function setFleetScripts(instance: FleetScripts | null): void {
  fleetScripts = instance;
}

function requireFleetScripts(): FleetScripts {
  if (!fleetScripts) {
    throw new AppError('Script service not initialized', 500, 'NOT_INITIALIZED');
  }
  return fleetScripts;
}

const pushScripts = async (req: Request, res: Response): Promise<void> => {
  const { scripts, hostOverride, concurrency }: ScriptPushRequest = req.body;
  const results = await requireFleetScripts().push(scripts, { hostOverride, concurrency });
  res.status(200).json({ results });
};

const runScripts = async (req: Request, res: Response): Promise<void> => {
  const { runs, hostOverride, concurrency }: ScriptRunRequest = req.body;
  const results = await requireFleetScripts().run(runs, { hostOverride, concurrency });
  res.status(200).json({ results });
};

export { setFleetScripts, pushScripts, runScripts };
