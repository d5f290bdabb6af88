import { describe, it, expect } from 'vitest';
import { otherFinding } from '../../src/collectors/harness.js';
import { createShodanCollector, parseShodanResponse } from '../../src/collectors/shodan.collector.js';
import { Deadline } from '../../src/concerns/deadline.js';
import { CollectorFailure } from '../../src/errors.js';
import { normalize } from '../../src/target-normalizer.class.js';
import { FakeHttpClient, jsonResponse, textResponse } from '../mocks/fake-http-client.js';

const target = normalize('203.0.113.5');

const host = {
  ip_str: '203.0.113.5',
  hostnames: ['Mail.Example.com'],
  ports: [22, 443],
  data: [{ port: 22, transport: 'tcp', product: 'OpenSSH', version: '8.9' }, { port: 'bad' }],
  org: 'Example Org',
  isp: null,
  asn: 'AS64500',
  country_name: 'Testland'
};

describe('shodan collector', () => {
  describe('parseShodanResponse', () => {
    it('should report the address, its services and its hostnames', () => {
      const findings = parseShodanResponse(JSON.stringify(host), target);

      expect(findings.map(f => [f.type, f.value])).toEqual([
        ['IPAddress', '203.0.113.5'],
        ['OpenPort', '203.0.113.5:22/tcp'],
        ['Other', otherFinding('shodan', '{"port":"bad"}').value],
        ['Subdomain', 'Mail.Example.com']
      ]);
      expect(findings[0]?.attributes).toEqual({ org: 'Example Org', asn: 'AS64500', country: 'Testland' });
      expect(findings[1]?.attributes).toEqual({
        port: '22',
        transport: 'tcp',
        parentType: 'IPAddress',
        parentValue: '203.0.113.5',
        relation: 'exposes',
        product: 'OpenSSH',
        version: '8.9'
      });
      expect(findings[3]?.attributes).toEqual({
        parentType: 'IPAddress',
        parentValue: '203.0.113.5',
        relation: 'resolves_to'
      });
    });

    it('should fall back to the port list without banner data', () => {
      const findings = parseShodanResponse(JSON.stringify({ ip_str: '203.0.113.5', ports: [80] }), target);
      expect(findings.map(f => f.value)).toEqual(['203.0.113.5', '203.0.113.5:80/tcp']);
    });

    it('should treat an empty body as no findings', () => {
      expect(parseShodanResponse('', target)).toEqual([]);
    });

    it('should reject records without an address', () => {
      expect(() => parseShodanResponse('{"foo":1}', target)).toThrow(CollectorFailure);
    });
  });

  describe('invoke', () => {
    it('should not call Shodan without an API key', async () => {
      const http = new FakeHttpClient(jsonResponse(200, host));
      const deadline = Deadline.after(1000);

      const result = await createShodanCollector({ http }).invoke(target, {}, deadline);

      expect(result.outcome).toBe('AuthMissing');
      expect(http.requests).toHaveLength(0);
      deadline.dispose();
    });

    it('should pass the key and keep it out of error details', async () => {
      const http = new FakeHttpClient(textResponse(401, 'Unauthorized'));
      const deadline = Deadline.after(1000);

      const result = await createShodanCollector({ http }).invoke(target, { apiKey: 'test-key' }, deadline);

      expect(http.requests[0]?.url).toBe('https://api.shodan.io/shodan/host/203.0.113.5?key=test-key');
      expect(result.outcome).toBe('AuthMissing');
      expect(result.errorDetail).toBe('HTTP 401 from https://api.shodan.io/shodan/host/203.0.113.5 (HTTP_401)');
      deadline.dispose();
    });
  });
});
