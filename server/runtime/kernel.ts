import type { Server } from "node:http";
import { createApp } from "../http/appFactory.js";
import { resolveCompletionClient } from "../providers.js";
import { resolveRuntimeConfig, type RuntimeConfig } from "./config.js";

export interface ServerRuntimeOptions {
  env?: NodeJS.ProcessEnv;
  config?: Partial<RuntimeConfig>;
}

export interface ServerRuntime {
  app: ReturnType<typeof createApp>;
  config: RuntimeConfig;
  start: () => Server;
  stop: () => void;
}

export function createServerRuntime(options: ServerRuntimeOptions = {}): ServerRuntime {
  const resolvedConfig = resolveRuntimeConfig(options.env);
  const config: RuntimeConfig = {
    ...resolvedConfig,
    ...(options.config ?? {})
  };
  const appVersion =
    (options.env?.AGENTLOOM_BUILD_VERSION ??
      process.env.AGENTLOOM_BUILD_VERSION ??
      options.env?.npm_package_version ??
      process.env.npm_package_version ??
      "dev").trim() || "dev";

  const app = createApp({
    apiAuthToken: config.apiAuthToken,
    allowedCorsOrigins: config.allowedCorsOrigins,
    allowAnyCorsOrigin: config.allowAnyCorsOrigin,
    system: {
      providers: config.providers,
      defaultProvider: config.generation.provider,
      getVersion: () => appVersion
    },
    generate: {
      defaults: config.generation,
      resolveClient: (providerId) => resolveCompletionClient(providerId, config.providers)
    }
  });

  let server: Server | null = null;

  function stop(): void {
    if (server) {
      server.close();
      server = null;
    }
  }

  function start(): Server {
    if (server) {
      return server;
    }

    server = app.listen(config.port, () => {
      console.log(`agentloom API listening on http://localhost:${config.port} (provider=${config.generation.provider})`);
      if (config.apiAuthToken.length === 0) {
        console.warn("[auth-warning] AGENTLOOM_API_TOKEN is empty; /api routes accept unauthenticated requests.");
      }
    });

    return server;
  }

  return {
    app,
    config,
    start,
    stop
  };
}
