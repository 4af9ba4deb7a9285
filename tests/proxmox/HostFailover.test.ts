import { Aggregator } from '../../src/check/Aggregator';
import { Severity } from '../../src/check/Severity';
import {
  AuthenticationError,
  NetworkError,
  TimeoutError,
} from '../../src/proxmox/ErrorHandling';
import { connectFirstAvailable } from '../../src/proxmox/HostFailover';
import {
  FakeClusterClient,
  silentLogger,
  type FakeClientOptions,
} from '../helpers/FakeClusterClient';

function factory(behaviour: Record<string, FakeClientOptions>) {
  return jest.fn((host: string) => new FakeClusterClient(host, behaviour[host]));
}

describe('HostFailover', () => {
  it('should connect to the first host that authenticates', async () => {
    const createClient = factory({
      A: { loginOk: false, lastError: new NetworkError('connect ECONNREFUSED') },
      B: { version: '8.2.2' },
    });
    const aggregator = new Aggregator();

    const result = await connectFirstAvailable(
      ['A', 'B', 'C'],
      createClient,
      aggregator,
      silentLogger,
    );

    expect(result.state).toBe('AUTHENTICATED');
    if (result.state === 'AUTHENTICATED') {
      expect(result.client.host).toBe('B');
      expect(result.version.version).toBe('8.2.2');
    }
    expect(createClient.mock.calls.map(([host]) => host)).toEqual(['A', 'B']);
    expect(aggregator.finish().output).toBe(
      'Proxmox WARNING: DOWN:A |\n' +
        'WARNING: A: unreachable: connect ECONNREFUSED\n' +
        'Connected to B (API version 8.2.2)\n',
    );
  });

  it('should describe each failed host by the kind of error', async () => {
    const createClient = factory({
      A: {
        loginOk: false,
        lastError: new AuthenticationError('HTTP 401 authentication failure'),
      },
      B: { versionError: new TimeoutError('Request to B:8006 timed out after 10000ms') },
      C: { versionError: { statusCode: 502, message: 'HTTP 502 Bad Gateway' } },
    });
    const aggregator = new Aggregator();

    await connectFirstAvailable(['A', 'B', 'C'], createClient, aggregator);

    expect(aggregator.finish().output).toBe(
      'Proxmox WARNING: DOWN:A. DOWN:B. DOWN:C |\n' +
        'WARNING: A: authentication failed: HTTP 401 authentication failure\n' +
        'WARNING: B: timed out: Request to B:8006 timed out after 10000ms\n' +
        'WARNING: C: server unavailable: HTTP 502 Bad Gateway\n',
    );
  });

  it('should not warn when the first host succeeds', async () => {
    const aggregator = new Aggregator();
    await connectFirstAvailable(['A'], factory({}), aggregator);
    expect(aggregator.status).toBe(Severity.OK);
  });

  it('should report every failed host in order when all fail', async () => {
    const createClient = factory({
      A: { ticketValid: false },
      B: { versionError: new Error('socket hang up') },
      C: { loginOk: false },
    });
    const aggregator = new Aggregator();

    const result = await connectFirstAvailable(['A', 'B', 'C'], createClient, aggregator);

    expect(result).toEqual({ state: 'EXHAUSTED' });
    expect(aggregator.finish().output).toBe(
      'Proxmox WARNING: DOWN:A. DOWN:B. DOWN:C |\n' +
        'WARNING: A: login ticket is not valid\n' +
        'WARNING: B: connection failed: socket hang up\n' +
        'WARNING: C: login failed\n',
    );
  });

  it('should treat a throwing client factory as a failed host', async () => {
    const createClient = jest.fn((host: string) => {
      if (host === 'bad') throw new Error('invalid host');
      return new FakeClusterClient(host);
    });
    const aggregator = new Aggregator();

    const result = await connectFirstAvailable(['bad', 'good'], createClient, aggregator);

    expect(result.state).toBe('AUTHENTICATED');
    expect(aggregator.finish().output).toBe(
      'Proxmox WARNING: DOWN:bad |\n' +
        'WARNING: bad: connection failed: invalid host\n' +
        'Connected to good (API version 8.1.4)\n',
    );
  });

  it('should be exhausted with no hosts', async () => {
    const aggregator = new Aggregator();
    const result = await connectFirstAvailable([], factory({}), aggregator);
    expect(result).toEqual({ state: 'EXHAUSTED' });
    expect(aggregator.status).toBe(Severity.OK);
  });
});
