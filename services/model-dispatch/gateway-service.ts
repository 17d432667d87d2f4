import dotenv from 'dotenv';
import { createBuiltinBackends } from './src/backends/index.js';
import { loadConfig } from './src/config.js';
import { ConfigError } from './src/errors.js';
import { createGatewayApp } from './src/gateway/gateway-app.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { ImageStore } from './src/storage/image-store.js';

dotenv.config();

/**
 * Usage: gateway-service <service_name>
 * Serves POST /predict and GET /status for one built-in backend.
 */
async function startGateway(argv: string[]): Promise<void> {
  const [serviceName] = argv;
  const config = loadConfig();
  const builtins = createBuiltinBackends({ imageStore: new ImageStore(config.imagesDir) });
  const backend = serviceName ? builtins.get(serviceName) : undefined;
  if (!backend) {
    throw new ConfigError(
      `Usage: gateway-service <service_name>, one of: ${Array.from(builtins.keys()).join(', ')}`
    );
  }

  const app = createGatewayApp({ backend, timeoutMs: config.syncTimeoutMs });
  const server = app.listen(config.gatewayPort, () => {
    console.log(`🌐 Gateway for ${backend.name} running on port ${config.gatewayPort}`);
  });

  const gracefulShutdown = new GracefulShutdown({ timeout: config.shutdownTimeoutMs });
  gracefulShutdown.addCleanupTask('http-server', () => new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  }));
}

startGateway(process.argv.slice(2)).catch((error: unknown) => {
  console.error('💥 Failed to start gateway:', error);
  process.exit(1);
});
