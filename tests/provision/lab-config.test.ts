import { test, describe, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { DEFAULT_CONFIG_PATH, findLabConfigFile, readLabConfig, resolveConfigPath } from '../../scripts/lib/lab-config.js';
import { ConfigError } from '../../scripts/provision/errors.js';
import { createTempDir, removeDir } from './helpers.js';

const SHIPPED_CONFIG = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../lab.config.yml');

const secrets = { LAB_DB_PASSWORD: 'test-secret', LAB_APP_PASSWORD: 'test-secret' };

const MINIMAL = [
  'packages:',
  '  base: [podman]',
  'database:',
  '  image: registry.example/db:latest',
  '  password: $DB_PASSWORD',
  '  dataDir: /data',
  '  appUser:',
  '    password: $DB_PASSWORD',
  'runtime:',
  '  venvDir: /venv',
  ''
].join('\n');

let tmpDir: string;

beforeEach(() => {
  tmpDir = createTempDir('labforge-labconfig-test-');
});

afterEach(() => {
  removeDir(tmpDir);
});

function writeConfig(content: string, name = 'lab.config.yml'): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, content, 'utf8');
  return file;
}

describe('readLabConfig', () => {
  test('loads the shipped appliance config', () => {
    const config = readLabConfig(SHIPPED_CONFIG, { processEnv: secrets });

    assert.equal(config.database.password, 'test-secret');
    assert.equal(config.database.appUser.password, 'test-secret');
    assert.equal(config.database.readyLogLine, 'DATABASE IS READY TO USE!');
    assert.deepEqual(
      config.content.sources.map((s) => s.name),
      ['code', 'labs']
    );
    assert.deepEqual(config.firewall.ports, [8888, 8501, 1521]);
    assert.equal(config.runtime.notebook.version, '4.2.5');
    assert.deepEqual(
      config.runtime.sourceBuilds.map((b) => [b.name, b.prefix]),
      [['sqlite', '/usr/local']]
    );
    assert.deepEqual(config.runtime.warmModels, ['all-MiniLM-L12-v2']);
  });

  test('a doubled dollar sign survives as a literal one', () => {
    const config = readLabConfig(SHIPPED_CONFIG, { processEnv: secrets });
    const profile = config.seedFiles.find((f) => f.path === '/etc/profile.d/labforge-path.sh');
    assert.equal(profile?.content, 'export PATH=/home/opc/bin:$PATH\n');
    assert.equal(profile?.mode, '0644');
  });

  test('applies defaults to omitted sections', () => {
    const config = readLabConfig(writeConfig(MINIMAL), { processEnv: { DB_PASSWORD: 'test-secret' } });

    assert.equal(config.paths.stateFile, '/var/lib/labforge/state.json');
    assert.equal(config.database.name, 'lab-db');
    assert.equal(config.database.appUser.name, 'vector');
    assert.deepEqual(config.retry, { maxAttempts: 5, baseDelaySec: 5 });
    assert.equal(config.services.notebook, true);
  });

  test('reads variables from .env beside the config, under the process environment', () => {
    const file = writeConfig(MINIMAL.replace('  venvDir: /venv', '  venvDir: $VENV'));
    fs.writeFileSync(path.join(tmpDir, '.env'), 'DB_PASSWORD=from-file\nVENV=/opt/venv\n', 'utf8');

    const config = readLabConfig(file, { processEnv: { DB_PASSWORD: 'test-secret' } });

    assert.equal(config.database.password, 'test-secret');
    assert.equal(config.runtime.venvDir, '/opt/venv');
  });

  test('unresolved variables are a config error', () => {
    assert.throws(
      () => readLabConfig(SHIPPED_CONFIG, { processEnv: {} }),
      (e: unknown) => {
        assert.ok(e instanceof ConfigError);
        assert.match(e.message, /^Unresolved variables in .*lab\.config\.yml: LAB_APP_PASSWORD, LAB_DB_PASSWORD\. /);
        return true;
      }
    );
  });

  test('schema violations are listed by path', () => {
    const file = writeConfig(MINIMAL.replace('  base: [podman]', '  base: []'));
    assert.throws(
      () => readLabConfig(file, { processEnv: { DB_PASSWORD: 'test-secret' } }),
      (e: unknown) => {
        assert.ok(e instanceof ConfigError);
        assert.match(e.message, /^ {2}- packages\.base: Array must contain at least 1 element\(s\)$/m);
        return true;
      }
    );
  });

  test('rejects a missing file and a document that is not a mapping', () => {
    assert.throws(() => readLabConfig(path.join(tmpDir, 'absent.yml')), /Lab config not found/);
    assert.throws(() => readLabConfig(writeConfig('- a\n- b\n')), /must contain a YAML mapping/);
  });
});

describe('resolveConfigPath', () => {
  test('--config wins over the environment', () => {
    assert.equal(
      resolveConfigPath('conf/lab.yml', { cwd: tmpDir, processEnv: { LABFORGE_CONFIG: '/etc/other.yml' } }),
      path.join(tmpDir, 'conf', 'lab.yml')
    );
  });

  test('LABFORGE_CONFIG wins over a discovered file', () => {
    writeConfig(MINIMAL);
    assert.equal(resolveConfigPath(undefined, { cwd: tmpDir, processEnv: { LABFORGE_CONFIG: '/etc/other.yml' } }), '/etc/other.yml');
  });

  test('finds a config in a parent directory', () => {
    const file = writeConfig(MINIMAL);
    const nested = path.join(tmpDir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    assert.equal(resolveConfigPath(undefined, { cwd: nested, processEnv: {} }), file);
  });

  test('falls back to the system-wide default', () => {
    assert.equal(findLabConfigFile(tmpDir, { maxDepth: 1 }), null);
    assert.equal(DEFAULT_CONFIG_PATH, '/etc/labforge/lab.config.yml');
  });
});

describe('findLabConfigFile', () => {
  test('refuses two config files in one directory', () => {
    writeConfig(MINIMAL, 'lab.config.yml');
    writeConfig(MINIMAL, 'lab.config.yaml');
    assert.throws(() => findLabConfigFile(tmpDir), /Multiple lab config files found/);
  });
});
