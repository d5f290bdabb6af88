import { describe, it, expect } from 'vitest';
import { CollectorRegistry } from '../src/collector-registry.class.js';
import { makeFinding } from '../src/collectors/harness.js';
import type { CollectorConfig } from '../src/collectors/collector.interface.js';
import { HttpStatusError, InvalidTargetError, NoApplicableCollectorError } from '../src/errors.js';
import { Orchestrator, type CollectorCompletedEvent, type CollectorRetryEvent } from '../src/orchestrator.class.js';
import { StubCollector } from './mocks/stub-collector.js';

function orchestratorFor(stubs: StubCollector[], collectors: Record<string, CollectorConfig> = {}): Orchestrator {
  const registry = new CollectorRegistry();
  for (const stub of stubs) registry.register(stub.adapter);
  return new Orchestrator({ registry, collectors, retryDelayMs: 1, random: () => 0.5 });
}

const www = makeFinding('Subdomain', 'www.example.com', 0.7);

describe('Orchestrator', () => {
  it('should complete when every collector reports, whatever its outcome', async () => {
    const alpha = new StubCollector({ name: 'alpha', findings: [www] });
    const keyed = new StubCollector({ name: 'keyed', requiredConfigKeys: ['apiKey'] });
    const orchestrator = orchestratorFor([alpha, keyed]);

    const { investigation, graph } = await orchestrator.investigate({ rawTarget: 'EXAMPLE.com', deadlineMs: 1000 });

    expect(investigation.status).toBe('Completed');
    expect(investigation.target.normalizedValue).toBe('example.com');
    expect(investigation.result('alpha')?.outcome).toBe('Success');
    expect(investigation.result('keyed')?.outcome).toBe('AuthMissing');
    expect(keyed.calls).toBe(0);
    expect([...graph.nodes.keys()]).toEqual(['Subdomain:www.example.com']);
    expect(investigation.graph).toBe(graph);
    expect(investigation.summary()).toEqual({
      selected: 2,
      completed: 2,
      succeeded: 1,
      failed: 1,
      outcomes: { Success: 1, AuthMissing: 1 }
    });
  });

  it('should time out when the investigation deadline cuts a collector short', async () => {
    const fast = new StubCollector({ name: 'fast', findings: [www] });
    const slow = new StubCollector({
      name: 'slow',
      delayMs: 5000,
      defaultTimeoutMs: 5000,
      findings: [makeFinding('Subdomain', 'late.example.com', 0.9)]
    });
    const orchestrator = orchestratorFor([fast, slow]);

    const { investigation, graph } = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 50 });

    expect(investigation.status).toBe('TimedOut');
    expect(investigation.result('fast')?.outcome).toBe('Success');
    expect(investigation.result('slow')?.outcome).toBe('Timeout');
    expect(investigation.result('slow')?.findings).toEqual([]);
    expect([...graph.nodes.keys()]).toEqual(['Subdomain:www.example.com']);
  });

  it('should complete when a collector only hits its own shorter timeout', async () => {
    const fast = new StubCollector({ name: 'fast', findings: [www] });
    const slow = new StubCollector({ name: 'slow', delayMs: 5000 });
    const orchestrator = orchestratorFor([fast, slow], { slow: { timeoutMs: 20 } });

    const { investigation } = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 2000 });

    expect(investigation.status).toBe('Completed');
    expect(investigation.result('slow')?.outcome).toBe('Timeout');
  });

  it('should retry network failures and count every attempt', async () => {
    const flaky = new StubCollector({ name: 'flaky', findings: [www], failures: [new HttpStatusError(503, 'https://api.example'), null] });
    const orchestrator = orchestratorFor([flaky]);
    const retries: CollectorRetryEvent[] = [];
    orchestrator.on('collector:retry', (event: CollectorRetryEvent) => retries.push(event));

    const { investigation } = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 1000 });

    const result = investigation.result('flaky');
    expect(result?.outcome).toBe('Success');
    expect(result?.attempts).toBe(2);
    expect(flaky.calls).toBe(2);
    expect(retries.map(event => [event.collector, event.attempt, event.delayMs])).toEqual([['flaky', 1, 1]]);
  });

  it('should not retry permanent failures', async () => {
    const denied = new StubCollector({ name: 'denied', failures: [new HttpStatusError(401, 'https://api.example')] });
    const orchestrator = orchestratorFor([denied]);

    const { investigation } = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 1000 });

    expect(investigation.result('denied')?.outcome).toBe('AuthMissing');
    expect(denied.calls).toBe(1);
  });

  it('should give up with RateLimited when no token arrives in time', async () => {
    const limited = new StubCollector({ name: 'limited', findings: [www], rateLimit: { maxCalls: 1, perIntervalMs: 60000 } });
    const orchestrator = orchestratorFor([limited], { limited: { timeoutMs: 100 } });

    const first = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 1000 });
    const second = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 1000 });

    expect(first.investigation.result('limited')?.outcome).toBe('Success');
    expect(second.investigation.result('limited')?.outcome).toBe('RateLimited');
    expect(second.investigation.result('limited')?.attempts).toBe(0);
    expect(second.investigation.status).toBe('Completed');
    expect(limited.calls).toBe(1);
  });

  it('should report AuthMissing without spending rate-limit tokens', async () => {
    const keyed = new StubCollector({
      name: 'keyed',
      findings: [www],
      requiredConfigKeys: ['apiKey'],
      rateLimit: { maxCalls: 1, perIntervalMs: 60000 }
    });
    const orchestrator = orchestratorFor([keyed], { keyed: { timeoutMs: 100 } });

    const first = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 1000 });
    const second = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 1000 });

    expect(first.investigation.result('keyed')?.outcome).toBe('AuthMissing');
    expect(second.investigation.result('keyed')?.outcome).toBe('AuthMissing');
    expect(second.investigation.result('keyed')?.attempts).toBe(0);
    expect(second.investigation.result('keyed')?.errorDetail).toBe('Missing required configuration: apiKey');
    expect(keyed.calls).toBe(0);
  });

  it('should merge the same finding from two collectors into one node', async () => {
    const alpha = new StubCollector({ name: 'alpha', findings: [makeFinding('Subdomain', 'mail.example.com', 0.5)] });
    const beta = new StubCollector({ name: 'beta', findings: [makeFinding('Subdomain', 'mail.example.com', 0.8)] });
    const orchestrator = orchestratorFor([alpha, beta]);

    const { investigation, graph } = await orchestrator.investigate({ rawTarget: 'EXAMPLE.com', deadlineMs: 1000 });

    expect(investigation.status).toBe('Completed');
    expect([...graph.nodes.keys()]).toEqual(['Subdomain:mail.example.com']);
    const node = graph.nodes.get('Subdomain:mail.example.com');
    expect(node?.confidence).toBe(0.8);
    expect(node?.provenance.map(record => [record.adapterName, record.confidence]).sort()).toEqual([
      ['alpha', 0.5],
      ['beta', 0.8]
    ]);
  });

  it('should skip disabled collectors', async () => {
    const alpha = new StubCollector({ name: 'alpha', findings: [www] });
    const beta = new StubCollector({ name: 'beta' });
    const orchestrator = orchestratorFor([alpha, beta], { beta: { enabled: false } });

    const { investigation } = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 1000 });

    expect(investigation.selected).toEqual(['alpha']);
    expect(investigation.skipped).toEqual(['beta']);
    expect(beta.calls).toBe(0);
  });

  it('should fail before dispatching when nothing can run', async () => {
    const alpha = new StubCollector({ name: 'alpha' });

    await expect(orchestratorFor([alpha], { alpha: { enabled: false } }).investigate({ rawTarget: 'example.com', deadlineMs: 1000 }))
      .rejects.toBeInstanceOf(NoApplicableCollectorError);
    await expect(orchestratorFor([alpha]).investigate({ rawTarget: 'johndoe', deadlineMs: 1000 }))
      .rejects.toBeInstanceOf(NoApplicableCollectorError);
    await expect(orchestratorFor([alpha]).investigate({ rawTarget: '', deadlineMs: 1000 }))
      .rejects.toBeInstanceOf(InvalidTargetError);
    expect(alpha.calls).toBe(0);
  });

  it('should end the investigation when the caller aborts', async () => {
    const slow = new StubCollector({ name: 'slow', delayMs: 5000, defaultTimeoutMs: 10000 });
    const orchestrator = orchestratorFor([slow]);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const { investigation } = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 10000, signal: controller.signal });

    expect(investigation.status).toBe('TimedOut');
    expect(investigation.result('slow')?.outcome).toBe('Timeout');
  });

  it('should report each collector once and seal once', async () => {
    const alpha = new StubCollector({ name: 'alpha', findings: [www] });
    const beta = new StubCollector({ name: 'beta', delayMs: 5 });
    const orchestrator = orchestratorFor([alpha, beta]);
    const completed: string[] = [];
    let sealed = 0;
    orchestrator.on('collector:completed', (event: CollectorCompletedEvent) => completed.push(event.result.adapterName));
    orchestrator.on('investigation:sealed', () => sealed++);

    const { investigation } = await orchestrator.investigate({ rawTarget: 'example.com', deadlineMs: 1000 });

    expect(completed.sort()).toEqual(['alpha', 'beta']);
    expect(sealed).toBe(1);
    expect(investigation.sealed).toBe(true);
    expect(investigation.record({
      adapterName: 'alpha',
      outcome: 'Success',
      durationMs: 1,
      findings: [],
      attempts: 1,
      finishedAt: new Date().toISOString()
    })).toBe(false);
  });

  it('should seal the registry it runs with', () => {
    const registry = new CollectorRegistry();
    new Orchestrator({ registry });
    expect(registry.isSealed).toBe(true);
  });
});
