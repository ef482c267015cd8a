import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import { runAsUser } from '../../scripts/lib/process.js';
import { containerRunArgs, PodmanRuntime } from '../../scripts/provision/capabilities/container.js';
import { GrowfsCommand } from '../../scripts/provision/capabilities/filesystem.js';
import { FirewalldFirewall } from '../../scripts/provision/capabilities/firewall.js';
import { PipLibraryInstaller, requirementOf } from '../../scripts/provision/capabilities/libraries.js';
import { DnfPackageInstaller } from '../../scripts/provision/capabilities/packages.js';
import { VenvRuntimeManager } from '../../scripts/provision/capabilities/runtime.js';
import { CommandError, PermanentError } from '../../scripts/provision/errors.js';
import { createFakeRunner } from './helpers.js';

describe('DnfPackageInstaller', () => {
  test('issues dnf commands', async () => {
    const fake = createFakeRunner();
    const dnf = new DnfPackageInstaller(fake.runner);

    await dnf.disableRepo('ol8_ksplice');
    await dnf.enableRepo('ol8_addons');
    await dnf.refreshMetadata();
    await dnf.install(['podman', 'git']);
    await dnf.install([]);

    assert.deepEqual(fake.lines(), [
      'dnf config-manager --set-disabled ol8_ksplice',
      'dnf config-manager --set-enabled ol8_addons',
      'dnf -y makecache --refresh',
      'dnf -y install podman git'
    ]);
  });

  test('a failing install raises a retryable CommandError', async () => {
    const fake = createFakeRunner(() => ({ exitCode: 1, stderr: 'Error: No match for argument: gti' }));
    const dnf = new DnfPackageInstaller(fake.runner);

    await assert.rejects(dnf.install(['gti']), (e: unknown) => {
      assert.ok(e instanceof CommandError);
      assert.equal(e.kind, 'transient');
      assert.equal(e.exitCode, 1);
      assert.equal(e.message, 'dnf -y install gti exited with 1: Error: No match for argument: gti');
      return true;
    });
  });

  test('hasCommand follows the exit status of command -v', async () => {
    const fake = createFakeRunner((call) => ({ exitCode: call.args[3] === 'podman' ? 0 : 1 }));
    const dnf = new DnfPackageInstaller(fake.runner);

    assert.equal(await dnf.hasCommand('podman'), true);
    assert.equal(await dnf.hasCommand('docker'), false);
    assert.deepEqual(fake.calls[0].args, ['-c', 'command -v "$1"', 'sh', 'podman']);
  });
});

describe('PodmanRuntime', () => {
  test('containerRunArgs lays out the run command', () => {
    assert.deepEqual(
      containerRunArgs({
        image: 'registry.example/db:latest',
        name: 'lab-db',
        replace: true,
        network: 'host',
        env: { ORACLE_PWD: 'test-secret', ORACLE_PDB: 'FREEPDB1' },
        volumes: [{ host: '/data', container: '/opt/oracle/oradata', options: 'z' }]
      }),
      [
        'run',
        '-d',
        '--replace',
        '--name',
        'lab-db',
        '--network=host',
        '-e',
        'ORACLE_PWD=test-secret',
        '-e',
        'ORACLE_PDB=FREEPDB1',
        '-v',
        '/data:/opt/oracle/oradata:z',
        'registry.example/db:latest'
      ]
    );
  });

  test('inspectHealth maps inspect output and failures', async () => {
    const answers = [{ stdout: 'healthy' }, { stdout: '' }, { exitCode: 125, stderr: 'no such container' }];
    const fake = createFakeRunner(() => answers.shift());
    const podman = new PodmanRuntime(fake.runner, '/usr/bin/podman');

    assert.equal(await podman.inspectHealth('lab-db'), 'healthy');
    assert.equal(await podman.inspectHealth('lab-db'), 'unknown');
    assert.equal(await podman.inspectHealth('lab-db'), 'unknown');
    assert.deepEqual(fake.calls[0].args, ['inspect', '--format', '{{.State.Health.Status}}', 'lab-db']);
  });

  test('isRunning is true only for a successful "true"', async () => {
    const answers = [{ stdout: 'true' }, { stdout: 'false' }, { exitCode: 125 }];
    const podman = new PodmanRuntime(createFakeRunner(() => answers.shift()).runner);

    assert.equal(await podman.isRunning('lab-db'), true);
    assert.equal(await podman.isRunning('lab-db'), false);
    assert.equal(await podman.isRunning('lab-db'), false);
  });

  test('exec feeds input and logs merge both streams', async () => {
    const fake = createFakeRunner((call) => (call.args[0] === 'logs' ? { stdout: 'out', stderr: 'err' } : undefined));
    const podman = new PodmanRuntime(fake.runner);

    await podman.exec('lab-db', ['bash', '-lc', 'sqlplus'], 'SELECT 1 FROM DUAL;');
    assert.equal(await podman.logs('lab-db'), 'out\nerr');

    assert.deepEqual(fake.calls[0].args, ['exec', '-i', 'lab-db', 'bash', '-lc', 'sqlplus']);
    assert.equal(fake.calls[0].options?.input, 'SELECT 1 FROM DUAL;');
  });
});

describe('VenvRuntimeManager', () => {
  test('creates the environment only when it is missing', async () => {
    const fake = createFakeRunner();
    await new VenvRuntimeManager(fake.runner, '/venv', () => false).install('3.9');
    await new VenvRuntimeManager(fake.runner, '/venv', () => true).install('3.9');

    assert.deepEqual(fake.lines(), ['python3.9 -m venv /venv']);
  });

  test('activate checks the interpreter version', async () => {
    const fake = createFakeRunner(() => ({ stdout: 'Python 3.9.18' }));
    const env = await new VenvRuntimeManager(fake.runner, '/venv', () => true).activate('3.9');
    assert.deepEqual(env, { version: '3.9', binDir: '/venv/bin', python: '/venv/bin/python' });
  });

  test('activate rejects another version or a missing environment', async () => {
    const other = createFakeRunner(() => ({ stdout: 'Python 3.11.2' }));
    await assert.rejects(new VenvRuntimeManager(other.runner, '/venv', () => true).activate('3.9'), PermanentError);
    await assert.rejects(new VenvRuntimeManager(other.runner, '/venv', () => false).activate('3.9'), PermanentError);
  });
});

describe('PipLibraryInstaller', () => {
  test('pins versions and supports a forced reinstall', async () => {
    const fake = createFakeRunner();
    const pip = new PipLibraryInstaller(fake.runner, '/venv/bin');

    await pip.upgradeTooling();
    await pip.install([{ name: 'numpy', version: '1.26.4' }, { name: 'oracledb' }]);
    await pip.install([{ name: 'jupyterlab', version: '4.2.5' }], { forceReinstall: true });
    await pip.install([]);

    assert.deepEqual(fake.lines(), [
      '/venv/bin/pip install --upgrade pip wheel setuptools',
      '/venv/bin/pip install --no-cache-dir numpy==1.26.4 oracledb',
      '/venv/bin/pip install --no-cache-dir --force-reinstall jupyterlab==4.2.5'
    ]);
  });

  test('requirementOf leaves unpinned libraries bare', () => {
    assert.equal(requirementOf({ name: 'oci' }), 'oci');
  });
});

describe('FirewalldFirewall', () => {
  test('opens each port permanently then reloads', async () => {
    const fake = createFakeRunner();
    const firewall = new FirewalldFirewall(fake.runner, 'public');

    await firewall.enable();
    await firewall.openPorts([8888, 1521]);
    await firewall.openPorts([]);

    assert.deepEqual(fake.lines(), [
      'systemctl enable --now firewalld',
      'firewall-cmd --zone=public --add-port=8888/tcp --permanent',
      'firewall-cmd --zone=public --add-port=1521/tcp --permanent',
      'firewall-cmd --reload'
    ]);
  });
});

describe('GrowfsCommand', () => {
  test('reports unavailable when the utility is absent', async () => {
    const fake = createFakeRunner();
    assert.equal(await new GrowfsCommand(fake.runner, '/usr/libexec/oci-growfs', () => false).grow(), 'unavailable');
    assert.equal(fake.calls.length, 0);
  });

  test('runs the utility non-interactively', async () => {
    const fake = createFakeRunner();
    assert.equal(await new GrowfsCommand(fake.runner, '/usr/libexec/oci-growfs', () => true).grow(), 'grown');
    assert.deepEqual(fake.lines(), ['/usr/libexec/oci-growfs -y']);
  });
});

describe('runAsUser', () => {
  test('prefixes runuser with the user and HOME', async () => {
    const fake = createFakeRunner();
    await runAsUser(fake.runner, 'opc', '/home/opc')('pip', ['--version']);
    assert.deepEqual(fake.lines(), ['runuser -u opc -- env HOME=/home/opc pip --version']);
  });

  test('returns the runner unchanged without a user', () => {
    const fake = createFakeRunner();
    assert.equal(runAsUser(fake.runner, undefined), fake.runner);
  });
});
