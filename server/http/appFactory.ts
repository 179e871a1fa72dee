import express from "express";

import {
  createApiAuthMiddleware,
  createCorsMiddleware,
  createErrorMiddleware,
  createNotFoundMiddleware,
  createSecurityHeadersMiddleware
} from "./middleware.js";
import { registerGenerateRoutes, type GenerateRouteDependencies } from "./routes/generate.js";
import { registerSystemRoutes, type SystemRouteDependencies } from "./routes/system.js";

export interface AppFactoryDependencies {
  apiAuthToken: string;
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
  system: SystemRouteDependencies;
  generate: GenerateRouteDependencies;
}

export function createApp(deps: AppFactoryDependencies): express.Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(createSecurityHeadersMiddleware());
  app.use(
    createCorsMiddleware({
      allowedOrigins: deps.allowedCorsOrigins,
      allowAnyOrigin: deps.allowAnyCorsOrigin
    })
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(createApiAuthMiddleware(deps.apiAuthToken));

  registerSystemRoutes(app, deps.system);
  registerGenerateRoutes(app, deps.generate);

  app.use(createNotFoundMiddleware());
  app.use(createErrorMiddleware());

  return app;
}
