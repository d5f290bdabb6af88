import { CollectorRegistry } from '../collector-registry.class.js';
import { createCommandRunner, type CommandRunner } from '../concerns/command-runner.js';
import { createHttpClient, type HttpClient } from '../concerns/http-client.js';
import { createCrtShCollector } from './crtsh.collector.js';
import { createHibpCollector } from './hibp.collector.js';
import { createShodanCollector } from './shodan.collector.js';
import { createSherlockCollector } from './sherlock.collector.js';
import { createHarvesterCollector } from './theharvester.collector.js';

export * from './collector.interface.js';
export { defineCollector, makeFinding, otherFinding, parseFragments, clampConfidence } from './harness.js';
export { createCrtShCollector, parseCrtShResponse } from './crtsh.collector.js';
export { createShodanCollector, parseShodanResponse } from './shodan.collector.js';
export { createHibpCollector, parseHibpResponse } from './hibp.collector.js';
export { createHarvesterCollector, parseHarvesterOutput } from './theharvester.collector.js';
export { createSherlockCollector, parseSherlockOutput } from './sherlock.collector.js';

export interface DefaultCollectorDependencies {
  http?: HttpClient;
  runner?: CommandRunner;
}

/** Registry holding every bundled collector, wired to the given transports. */
export function createDefaultRegistry(dependencies: DefaultCollectorDependencies = {}): CollectorRegistry {
  const http = dependencies.http ?? createHttpClient();
  const runner = dependencies.runner ?? createCommandRunner();

  return new CollectorRegistry()
    .register(createCrtShCollector({ http }))
    .register(createShodanCollector({ http }))
    .register(createHibpCollector({ http }))
    .register(createHarvesterCollector({ runner }))
    .register(createSherlockCollector({ runner }));
}
