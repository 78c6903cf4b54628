import { Request, Response } from 'express';
import { AppError } from '../middleware/errorHandler';
import type { FleetConfigStore } from '../services/fleetConfigStore';
import { classifyNode } from '../services/nodeClassifier';

type StoreOpener = () => Promise<FleetConfigStore>;

let openStore: StoreOpener | null = null;

function setStoreOpener(opener: StoreOpener | null): void {
  openStore = opener;
}

/**
 * Current config nodes with the role each one would get in a run.
 */
const getAllNodes = async (_req: Request, res: Response): Promise<void> => {
  if (!openStore) {
    throw new AppError('Fleet config not initialized', 500, 'NOT_INITIALIZED');
  }

  const store = await openStore();
  const { projectName, nodes } = store.snapshot();

  res.status(200).json({
    projectName: projectName ?? null,
    nodes: nodes.map(({ extras: _extras, ...node }) => ({
      ...node,
      role: classifyNode(node.name),
    })),
  });
};

export { setStoreOpener, getAllNodes };
