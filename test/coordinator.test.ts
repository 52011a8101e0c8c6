import { InitError, NetworkApplyError } from '../lib/errors';
import { buildPlan } from '../lib/plan';
import type { PluginId } from '../lib/types';
import { initializeCoordinator, parseInterfaceAddress, parseJoinCommand, weaveManifestUrl } from '../worker/coordinator';
import { FakeRunner, JOIN_LINE, TRUST, silenceConsole, testConfig } from './test-helper';

const COORD = '192.168.205.10';

function setup(plugin: PluginId) {
  const config = testConfig({ NETWORK_PLUGIN: plugin, WORKER_COUNT: '0' });
  const plan = buildPlan(config);
  const runner = new FakeRunner();
  const ctx = { runner, config, trust: TRUST };
  return { plan, runner, ctx };
}

describe('parsers', () => {
  test('interface address', () => {
    expect(parseInterfaceAddress('3: enp0s8    inet 192.168.205.10/24 brd 192.168.205.255 scope global enp0s8')).toBe(
      '192.168.205.10'
    );
    expect(parseInterfaceAddress('')).toBeNull();
  });

  test('join command from kubeadm output', () => {
    expect(parseJoinCommand(`W0101 warning\n${JOIN_LINE}\n`, '/etc/kubeadm/join.sh')).toEqual({
      path: '/etc/kubeadm/join.sh',
      command: JOIN_LINE,
      endpoint: '192.168.205.10:6443',
      token: 'abcdef.0123456789abcdef',
    });
  });

  test('join command from a saved script', () => {
    expect(parseJoinCommand(`#!/bin/sh\n${JOIN_LINE}\n`, '/j')?.endpoint).toBe('192.168.205.10:6443');
  });

  test('no join command', () => {
    expect(parseJoinCommand('error: token expired', '/j')).toBeNull();
    expect(parseJoinCommand('kubeadm join --token x', '/j')).toBeNull();
    expect(parseJoinCommand('kubeadm join 10.0.0.1:6443 --discovery-token-unsafe-skip-ca-verification', '/j')).toBeNull();
  });

  test('weave manifest url carries the base64 kubectl version', () => {
    expect(weaveManifestUrl('https://cloud.weave.works/k8s/net', 'v1')).toBe(
      'https://cloud.weave.works/k8s/net?k8s-version=djE%3D'
    );
  });
});

describe('Coordinator Initializer', () => {
  silenceConsole();

  test('calico: init with its CIDR then both manifests in order', async () => {
    const { plan, runner, ctx } = setup('calico');
    const result = await initializeCoordinator(plan.coordinator, plan.plugin, ctx);

    expect(result).toEqual({
      advertiseAddress: COORD,
      credential: {
        path: '/etc/kubeadm/join.sh',
        command: JOIN_LINE,
        endpoint: '192.168.205.10:6443',
        token: 'abcdef.0123456789abcdef',
      },
      initSkipped: false,
      credentialReused: false,
      warnings: [],
    });

    const lines = runner.lines(COORD);
    expect(lines).toContain('sudo kubeadm init --apiserver-advertise-address=192.168.205.10 --pod-network-cidr=192.168.0.0/16');
    const applies = lines.filter((l) => l.includes('kubectl apply'));
    expect(applies).toEqual([
      'sudo env KUBECONFIG=/etc/kubernetes/admin.conf kubectl apply -f https://docs.projectcalico.org/v3.3/getting-started/kubernetes/installation/hosted/rbac-kdd.yaml',
      'sudo env KUBECONFIG=/etc/kubernetes/admin.conf kubectl apply -f https://docs.projectcalico.org/v3.3/getting-started/kubernetes/installation/hosted/kubernetes-datastore/calico-networking/1.7/calico.yaml',
    ]);
    expect(lines.some((l) => l.includes('ip route'))).toBe(false);
  });

  test('steps run in order: init, network, credential, trust key', async () => {
    const { plan, runner, ctx } = setup('calico');
    await initializeCoordinator(plan.coordinator, plan.plugin, ctx);
    const lines = runner.lines(COORD);
    const at = (needle: string) => lines.findIndex((l) => l.includes(needle));

    expect(at('ip -4 -o addr show dev enp0s8')).toBe(0);
    expect(at('kubeadm init')).toBeLessThan(at('kubectl get --raw=/readyz'));
    expect(at('kubectl get --raw=/readyz')).toBeLessThan(at('kubectl apply'));
    expect(at('kubectl apply')).toBeLessThan(at('kubeadm token create'));
    expect(at('kubeadm token create')).toBeLessThan(at('chmod 0755'));
    expect(at('chmod 0755')).toBeLessThan(at('authorized_keys'));
  });

  test('join script is written with the minted command', async () => {
    const { plan, runner, ctx } = setup('calico');
    await initializeCoordinator(plan.coordinator, plan.plugin, ctx);
    const write = runner.calls.find((c) => c.line.includes('chmod 0755'));
    expect(write?.stdin).toBe(`#!/bin/sh\n${JOIN_LINE}\n`);
    expect(write?.line.endsWith(' sh /etc/kubeadm/join.sh')).toBe(true);
  });

  test('the trust public key is authorized', async () => {
    const { plan, runner, ctx } = setup('calico');
    await initializeCoordinator(plan.coordinator, plan.plugin, ctx);
    const line = runner.lines(COORD).find((l) => l.includes('authorized_keys'));
    expect(line?.endsWith(" sh 'ssh-ed25519 test-public-key kubelab'")).toBe(true);
  });

  test('weave: no CIDR, service route on the adapter, versioned manifest', async () => {
    const { plan, runner, ctx } = setup('weave');
    await initializeCoordinator(plan.coordinator, plan.plugin, ctx);
    const lines = runner.lines(COORD);

    expect(lines).toContain('sudo kubeadm init --apiserver-advertise-address=192.168.205.10');
    expect(lines).toContain('sudo ip route replace 10.96.0.1/32 dev enp0s8');
    const url = weaveManifestUrl('https://cloud.weave.works/k8s/net', 'Client Version: v1.31.0\nServer Version: v1.31.0');
    const apply = lines.find((l) => l.includes('kubectl apply'));
    expect(apply).toBe(`sudo env KUBECONFIG=/etc/kubernetes/admin.conf kubectl apply -f '${url}'`);
  });

  test('flannel: the fetched manifest is patched with the host interface', async () => {
    const { plan, runner, ctx } = setup('flannel');
    runner.on('curl -fsSL', '        args:\n        - --ip-masq\n        - --kube-subnet-mgr\n');
    const result = await initializeCoordinator(plan.coordinator, plan.plugin, ctx);

    expect(result.warnings).toEqual([]);
    expect(runner.lines(COORD)).toContain(
      'curl -fsSL --retry 3 https://raw.githubusercontent.com/coreos/flannel/master/Documentation/kube-flannel.yml'
    );
    const apply = runner.calls.find((c) => c.line.endsWith('kubectl apply -f -'));
    expect(apply?.stdin).toBe('        args:\n        - --ip-masq\n        - --kube-subnet-mgr\n        - --iface=enp0s8\n');
    expect(runner.lines(COORD)).toContain(
      'sudo kubeadm init --apiserver-advertise-address=192.168.205.10 --pod-network-cidr=10.244.0.0/16'
    );
  });

  test('a manifest that cannot be patched is a warning, the credential is still issued', async () => {
    const { plan, runner, ctx } = setup('flannel');
    runner.on('curl -fsSL', 'kind: DaemonSet\n');
    const result = await initializeCoordinator(plan.coordinator, plan.plugin, ctx);

    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toBeInstanceOf(NetworkApplyError);
    expect(result.warnings[0].machine).toBe('lab-coordinator');
    expect(result.credential.command).toBe(JOIN_LINE);
  });

  test('a failed apply is a warning', async () => {
    const { plan, runner, ctx } = setup('calico');
    runner.on('rbac-kdd.yaml', new Error('connection refused'));
    const result = await initializeCoordinator(plan.coordinator, plan.plugin, ctx);

    expect(result.warnings.map((w) => w.message)).toEqual([
      '[network:lab-coordinator] manifest 1/2: connection refused',
    ]);
    expect(runner.lines(COORD).filter((l) => l.includes('calico.yaml'))).toHaveLength(1);
  });

  test('re-entry skips init and reuses the saved join script', async () => {
    const { plan, runner, ctx } = setup('calico');
    runner
      .probe('test -s /etc/kubernetes/admin.conf', true)
      .probe('test -s /etc/kubeadm/join.sh', true)
      .on('sudo cat /etc/kubeadm/join.sh', `#!/bin/sh\n${JOIN_LINE}\n`);
    const result = await initializeCoordinator(plan.coordinator, plan.plugin, ctx);

    expect(result.initSkipped).toBe(true);
    expect(result.credentialReused).toBe(true);
    expect(result.credential.token).toBe('abcdef.0123456789abcdef');
    const lines = runner.lines(COORD);
    expect(lines.some((l) => l.includes('kubeadm init'))).toBe(false);
    expect(lines.some((l) => l.includes('token create'))).toBe(false);
    expect(lines.some((l) => l.includes('chmod 0755'))).toBe(false);
  });

  test('an unreadable saved join script is replaced', async () => {
    const { plan, runner, ctx } = setup('calico');
    runner
      .probe('test -s /etc/kubernetes/admin.conf', true)
      .probe('test -s /etc/kubeadm/join.sh', true)
      .on('sudo cat /etc/kubeadm/join.sh', 'garbage\n');
    const result = await initializeCoordinator(plan.coordinator, plan.plugin, ctx);

    expect(result.credentialReused).toBe(false);
    expect(runner.lines(COORD).some((l) => l.includes('chmod 0755'))).toBe(true);
  });

  test('a fresh init mints a new credential over a leftover join script', async () => {
    const { plan, runner, ctx } = setup('calico');
    const stale = 'kubeadm join 192.168.205.10:6443 --token stale0.0000000000000000 --discovery-token-ca-cert-hash sha256:1111';
    runner.probe('test -s /etc/kubeadm/join.sh', true).on('sudo cat /etc/kubeadm/join.sh', `#!/bin/sh\n${stale}\n`);
    const result = await initializeCoordinator(plan.coordinator, plan.plugin, ctx);

    expect(result.initSkipped).toBe(false);
    expect(result.credentialReused).toBe(false);
    expect(result.credential.token).toBe('abcdef.0123456789abcdef');
    const lines = runner.lines(COORD);
    expect(lines).not.toContain('sudo test -s /etc/kubeadm/join.sh');
    expect(lines).not.toContain('sudo cat /etc/kubeadm/join.sh');
    expect(lines.filter((l) => l.includes('token create'))).toHaveLength(1);
    const write = runner.calls.find((c) => c.line.includes('chmod 0755'));
    expect(write?.stdin).toBe(`#!/bin/sh\n${JOIN_LINE}\n`);
  });

  test('no address on the host interface is fatal', async () => {
    const { plan, runner, ctx } = setup('calico');
    runner.on('ip -4 -o addr show dev', '');
    await expect(initializeCoordinator(plan.coordinator, plan.plugin, ctx)).rejects.toThrow(
      '[init:lab-coordinator] no IPv4 address on enp0s8'
    );
  });

  test('kubeadm init failure is fatal', async () => {
    const { plan, runner, ctx } = setup('calico');
    runner.on('kubeadm init', new Error('preflight checks failed'));
    const err = await initializeCoordinator(plan.coordinator, plan.plugin, ctx).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InitError);
    expect(err).toMatchObject({ phase: 'init', machine: 'lab-coordinator' });
    expect(err).toHaveProperty('message', '[init:lab-coordinator] kubeadm init failed: preflight checks failed');
    expect(runner.lines(COORD).some((l) => l.includes('kubectl apply'))).toBe(false);
  });

  test('unexpected token output is fatal', async () => {
    const { plan, runner, ctx } = setup('calico');
    runner.on('kubeadm token create', 'nothing useful');
    await expect(initializeCoordinator(plan.coordinator, plan.plugin, ctx)).rejects.toThrow(
      'unexpected kubeadm output: nothing useful'
    );
  });
});
