import { loadConfig, parseJobOverrides, toSeries, withJobOverrides } from '../lib/config';
import { ConfigError, MalformedAddressError } from '../lib/errors';

describe('loadConfig', () => {
  test('defaults', () => {
    const config = loadConfig({ SSH_KEY_PATH: '/keys/test-key' });
    expect(config.networkPlugin).toBeNull();
    expect(config.clusterName).toBe('lab');
    expect(config.coordinatorAddress).toBe('192.168.205.10');
    expect(config.workerCount).toBe(2);
    expect(config.k8sSeries).toBe('v1.31');
    expect(config.ssh).toEqual({
      user: 'vagrant',
      keyPath: '/keys/test-key',
      trustKeyPath: '/keys/test-key',
      timeoutMs: 120000,
    });
    expect(config.hostInterface).toBe('enp0s8');
    expect(config.serviceAddress).toBe('10.96.0.1');
    expect(config.joinScriptPath).toBe('/etc/kubeadm/join.sh');
    expect(config.workerConcurrency).toBe(1);
    expect(config.redisUrl).toBeNull();
    expect(config.queueName).toBe('cluster-bootstrap');
    expect(config.supabase).toBeNull();
  });

  test('blank values fall back to defaults', () => {
    const config = loadConfig({ SSH_KEY_PATH: '/k', NETWORK_PLUGIN: '', WORKER_COUNT: ' ', CLUSTER_NAME: '' });
    expect(config.networkPlugin).toBeNull();
    expect(config.workerCount).toBe(2);
    expect(config.clusterName).toBe('lab');
  });

  test('numbers are coerced from strings', () => {
    const config = loadConfig({ SSH_KEY_PATH: '/k', WORKER_COUNT: '5', WORKER_CONCURRENCY: '3' });
    expect(config.workerCount).toBe(5);
    expect(config.workerConcurrency).toBe(3);
  });

  test('invalid values are configuration errors', () => {
    expect(() => loadConfig({ SSH_KEY_PATH: '/k', WORKER_COUNT: 'two' })).toThrow(ConfigError);
    expect(() => loadConfig({ SSH_KEY_PATH: '/k', COORDINATOR_CPUS: '1' })).toThrow(ConfigError);
    expect(() => loadConfig({ SSH_KEY_PATH: '/k', CLUSTER_NAME: 'Lab_1' })).toThrow(ConfigError);
  });

  test('malformed coordinator address', () => {
    expect(() => loadConfig({ SSH_KEY_PATH: '/k', COORDINATOR_ADDRESS: '192.168.205' })).toThrow(MalformedAddressError);
  });

  test('trust key defaults to the ssh key but can differ', () => {
    expect(loadConfig({ SSH_KEY_PATH: '/k', TRUST_KEY_PATH: '/t' }).ssh.trustKeyPath).toBe('/t');
  });

  test('supabase needs both url and key', () => {
    expect(loadConfig({ SSH_KEY_PATH: '/k', SUPABASE_URL: 'http://localhost:54321' }).supabase).toBeNull();
    expect(
      loadConfig({ SSH_KEY_PATH: '/k', SUPABASE_URL: 'http://localhost:54321', SUPABASE_SERVICE_ROLE_KEY: 'test-secret' })
        .supabase
    ).toEqual({ url: 'http://localhost:54321', serviceRoleKey: 'test-secret' });
  });
});

describe('toSeries', () => {
  test.each([
    ['1.31', 'v1.31'],
    ['v1.30', 'v1.30'],
    ['v1.29.3', 'v1.29'],
    [undefined, 'v1.31'],
  ])('%p -> %p', (input, expected) => {
    expect(toSeries(input)).toBe(expected);
  });

  test('garbage is rejected', () => {
    expect(() => toSeries('latest')).toThrow(ConfigError);
  });

  test('K8S_MINOR is honored when K8S_SERIES is absent', () => {
    expect(loadConfig({ SSH_KEY_PATH: '/k', K8S_MINOR: '1.30' }).k8sSeries).toBe('v1.30');
    expect(loadConfig({ SSH_KEY_PATH: '/k', K8S_MINOR: '1.30', K8S_SERIES: 'v1.29' }).k8sSeries).toBe('v1.29');
  });
});

describe('job overrides', () => {
  const base = loadConfig({ SSH_KEY_PATH: '/k' });

  test('override only what is given', () => {
    const config = withJobOverrides(base, parseJobOverrides({ networkPlugin: 'flannel', workerCount: 3 }));
    expect(config.networkPlugin).toBe('flannel');
    expect(config.workerCount).toBe(3);
    expect(config.clusterName).toBe('lab');
    expect(config.coordinatorAddress).toBe('192.168.205.10');
  });

  test('missing data means no overrides', () => {
    expect(parseJobOverrides(undefined)).toEqual({});
  });

  test('bad overrides are configuration errors', () => {
    expect(() => parseJobOverrides({ workerCount: -1 })).toThrow(ConfigError);
    expect(() => parseJobOverrides({ workerCount: 'x' })).toThrow(ConfigError);
    expect(() => withJobOverrides(base, { coordinatorAddress: '10.0.0.300' })).toThrow(MalformedAddressError);
  });
});
