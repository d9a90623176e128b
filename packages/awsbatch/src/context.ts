import type { AwsClients } from './clients.js';
import type { DriverConfig } from './config.js';
import type { JobDefinitionRegistry } from './job-definitions.js';

/** Everything a lifecycle step needs: shared clients, settings and the definition cache. */
export interface DriverContext {
  clients: AwsClients;
  config: Readonly<DriverConfig>;
  registry: JobDefinitionRegistry;
}
