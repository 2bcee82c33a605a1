import type { FastifyInstance } from 'fastify';

import { registerAuthRoutes } from '../features/auth/routes.js';
import { registerExpenseRoutes } from '../features/expenses/routes.js';
import { registerSystemRoutes } from '../features/system/routes.js';

type FeatureRegistrar = (app: FastifyInstance) => void;

interface FeatureRouteRegistration {
  name: string;
  prefix?: string;
  registrar: FeatureRegistrar;
}

export const featureRouteRegistrations: readonly FeatureRouteRegistration[] = [
  { name: 'system', registrar: registerSystemRoutes },
  { name: 'auth', prefix: '/v1/auth', registrar: registerAuthRoutes },
  { name: 'expenses', prefix: '/v1/expenses', registrar: registerExpenseRoutes },
];

const registerFeature = (
  app: FastifyInstance,
  registration: FeatureRouteRegistration,
  prefix?: string,
): void => {
  const plugin = async (featureApp: FastifyInstance): Promise<void> => {
    registration.registrar(featureApp);
  };

  if (prefix) {
    app.register(plugin, { prefix });
    return;
  }

  app.register(plugin);
};

export const registerFeatureRoutes = (app: FastifyInstance): void => {
  for (const registration of featureRouteRegistrations) {
    registerFeature(app, registration, registration.prefix);
  }
};
