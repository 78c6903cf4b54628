import express, { Request, Response } from 'express';
import helmet from 'helmet';
import { config } from './config';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import * as nodesController from './controllers/nodes';
import * as provisioningController from './controllers/provisioning';
import * as scriptsController from './controllers/scripts';
import routes from './routes';
import { FleetConfigStore } from './services/fleetConfigStore';
import { FleetProvisioner } from './services/fleetProvisioner';
import { FleetScripts } from './services/fleetScripts';

export interface AppServices {
  provisioner: FleetProvisioner;
  fleetScripts: FleetScripts;
  openStore: () => Promise<FleetConfigStore>;
  configPath: string;
}

export function defaultServices(): AppServices {
  const configPath = config.fleet.configPath;
  return {
    provisioner: new FleetProvisioner(),
    fleetScripts: new FleetScripts(),
    openStore: () => FleetConfigStore.open(configPath),
    configPath,
  };
}

export function createApp(services: AppServices = defaultServices()): express.Application {
  const app = express();

  // Security middleware
  app.use(helmet());

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  nodesController.setStoreOpener(services.openStore);
  provisioningController.setProvisioner(services.provisioner);
  scriptsController.setFleetScripts(services.fleetScripts);

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      environment: config.server.env,
      configPath: services.configPath,
    });
  });

  app.use(routes);

  // Error handling middleware (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
