import { describe, it, expect } from 'vitest';
import { CollectorRegistry } from '../src/collector-registry.class.js';
import {
  ConfigurationError,
  DuplicateAdapterError,
  RegistrySealedError,
  UnknownCollectorError
} from '../src/errors.js';
import { normalize } from '../src/target-normalizer.class.js';
import { StubCollector } from './mocks/stub-collector.js';

function stub(name: string, kinds: Array<'Domain' | 'IPAddress' | 'Email' | 'Username'>, priority?: number) {
  return new StubCollector({ name, kinds, priority }).adapter;
}

describe('CollectorRegistry', () => {
  it('should select collectors by target kind, priority first, then name', () => {
    const registry = new CollectorRegistry()
      .register(stub('zeta', ['Domain']))
      .register(stub('alpha', ['Domain', 'IPAddress']))
      .register(stub('beta', ['Domain'], 10))
      .register(stub('gamma', ['Email']));

    expect(registry.select(normalize('example.com')).map(d => d.name)).toEqual(['beta', 'alpha', 'zeta']);
    expect(registry.select(normalize('8.8.8.8')).map(d => d.name)).toEqual(['alpha']);
    expect(registry.select(normalize('johndoe'))).toEqual([]);
  });

  it('should list descriptors by name', () => {
    const registry = new CollectorRegistry()
      .register(stub('b-two', ['Domain']))
      .register(stub('a-one', ['Domain']));

    expect(registry.list().map(d => d.name)).toEqual(['a-one', 'b-two']);
    expect(registry.size).toBe(2);
    expect(registry.has('a-one')).toBe(true);
  });

  it('should reject duplicate names', () => {
    const registry = new CollectorRegistry().register(stub('crtsh', ['Domain']));
    expect(() => registry.register(stub('crtsh', ['Domain']))).toThrow(DuplicateAdapterError);
  });

  it('should reject registration once sealed', () => {
    const registry = new CollectorRegistry().seal();
    expect(registry.isSealed).toBe(true);
    expect(() => registry.register(stub('late', ['Domain']))).toThrow(RegistrySealedError);
  });

  it('should validate descriptors', () => {
    const registry = new CollectorRegistry();
    try {
      registry.register(stub('Bad Name', []));
      expect.fail('expected register to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues.map(issue => issue.path)).toEqual(['name', 'acceptedTargetKinds']);
      }
    }
    expect(registry.size).toBe(0);
  });

  it('should resolve adapters by name', () => {
    const adapter = stub('crtsh', ['Domain']);
    const registry = new CollectorRegistry().register(adapter);

    expect(registry.resolve('crtsh')).toBe(adapter);
    expect(() => registry.resolve('missing')).toThrow(UnknownCollectorError);
  });
});
