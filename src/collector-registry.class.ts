import { z } from 'zod';
import { compareStrings } from './concerns/compare.js';
import type { CollectorAdapter, CollectorDescriptor } from './collectors/collector.interface.js';
import { ConfigurationError, DuplicateAdapterError, RegistrySealedError, UnknownCollectorError } from './errors.js';
import { TARGET_KINDS, type Target } from './types/investigation.types.js';

const descriptorSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'must be lower-case letters, digits, "-" or "_"'),
  transport: z.enum(['http', 'process', 'custom']),
  acceptedTargetKinds: z.array(z.enum(TARGET_KINDS)).min(1),
  requiredConfigKeys: z.array(z.string().min(1)),
  rateLimit: z.object({
    maxCalls: z.number().int().nonnegative(),
    perIntervalMs: z.number().int().nonnegative()
  }),
  priority: z.number().int().optional(),
  defaultTimeoutMs: z.number().int().positive().optional(),
  description: z.string().optional()
});

/**
 * Collector capabilities, keyed by collector name. Built once at startup and
 * sealed by the orchestrator; from then on it is read-only.
 */
export class CollectorRegistry {
  private readonly adapters = new Map<string, CollectorAdapter>();
  private sealed = false;

  register(adapter: CollectorAdapter): this {
    const { name } = adapter.descriptor;

    if (this.sealed) {
      throw new RegistrySealedError(name);
    }
    if (this.adapters.has(name)) {
      throw new DuplicateAdapterError(name);
    }

    const parsed = descriptorSchema.safeParse(adapter.descriptor);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid descriptor for collector "${name}"`, {
        issues: parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
      });
    }

    this.adapters.set(name, adapter);
    return this;
  }

  /** Descriptors accepting the target's kind, by descending priority then name. */
  select(target: Target): CollectorDescriptor[] {
    return this.list()
      .filter(descriptor => descriptor.acceptedTargetKinds.includes(target.kind))
      .sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0) || compareStrings(a.name, b.name));
  }

  resolve(name: string): CollectorAdapter {
    const adapter = this.adapters.get(name);
    if (!adapter) {
      throw new UnknownCollectorError(name);
    }
    return adapter;
  }

  has(name: string): boolean {
    return this.adapters.has(name);
  }

  list(): CollectorDescriptor[] {
    return [...this.adapters.values()]
      .map(adapter => adapter.descriptor)
      .sort((a, b) => compareStrings(a.name, b.name));
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.adapters.size;
  }
}
