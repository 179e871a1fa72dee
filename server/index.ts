import { createServerRuntime } from "./runtime/kernel.js";

const runtime = createServerRuntime();
runtime.start();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    console.log(`Received ${signal}; shutting down.`);
    runtime.stop();
    process.exit(0);
  });
}
