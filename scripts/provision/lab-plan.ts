/**
 * The GenAI lab appliance as a sequence of phases.
 *
 * Every step is safe to repeat: a phase that failed halfway reruns from its
 * first step on the next invocation, so actions either check before they act
 * or overwrite what a previous attempt left behind.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import type { LabConfig, SourceBuild } from '../schemas/lab-config.zod.js';
import type { HostCapabilities } from './capabilities/index.js';
import { runChecked } from './capabilities/command.js';
import { databaseReadiness, listenerReadiness, loadSql, runSql } from './database.js';
import { errorMessage, PermanentError, TransientError } from './errors.js';
import { readinessStep } from './readiness.js';
import { unitFileName, type ServiceDeclaration, type ServiceRegistrar } from './service-registrar.js';
import type { Phase, Step } from './types.js';

export const PHASES = {
  prepareHost: 'prepare-host',
  installPackages: 'install-packages',
  startDatabase: 'start-database',
  configureDatabase: 'configure-database',
  installRuntime: 'install-runtime',
  fetchContent: 'fetch-content',
  openFirewall: 'open-firewall',
  registerServices: 'register-services'
} as const;

export type LabPlanOptions = {
  registrar: ServiceRegistrar;
  /** Passed to generated units that call back into the CLI. */
  configPath?: string;
  pathExists?: (p: string) => boolean;
};

export function serviceName(config: LabConfig, suffix: string): string {
  return `${config.services.prefix}-${suffix}`;
}

/**
 * Apply `fn` to every item, then fail with all collected errors at once so a
 * retry covers the items that did not go through.
 */
async function forEachItem<T>(
  items: readonly T[],
  label: (item: T) => string,
  fn: (item: T) => Promise<void>
): Promise<void> {
  const failures: string[] = [];
  for (const item of items) {
    try {
      await fn(item);
    } catch (e) {
      failures.push(`${label(item)}: ${errorMessage(e)}`);
    }
  }
  if (failures.length > 0) {
    throw new TransientError(failures.join('; '));
  }
}

export function containerEngineConfig(config: LabConfig): string {
  const engine = config.containerEngine;
  return ['[engine]', `cgroup_manager = "${engine.cgroupManager}"`, `events_logger = "${engine.eventsLogger}"`, ''].join('\n');
}

export function provisionerService(config: LabConfig, opts: Pick<LabPlanOptions, 'configPath'>): ServiceDeclaration {
  const args = opts.configPath ? ['--config', opts.configPath] : [];
  return {
    name: serviceName(config, 'provision'),
    description: 'labforge provisioning (resumes an interrupted run)',
    command: [config.paths.cli, ...args, 'run'].join(' '),
    type: 'oneshot'
  };
}

export function databaseService(config: LabConfig): ServiceDeclaration {
  return {
    name: serviceName(config, 'database'),
    description: `labforge database container (${config.database.name})`,
    command: `${config.containerEngine.binary} start -a ${config.database.name}`,
    restart: 'on-failure',
    restartSec: config.services.restartSec,
    startNow: true
  };
}

/** `NAME=value` assignments for `env`, empty when no library path is configured. */
function libraryPathAssignments(config: LabConfig): string[] {
  const { libraryPath } = config.runtime;
  return libraryPath.length > 0 ? [`LD_LIBRARY_PATH=${libraryPath.join(':')}`] : [];
}

export function notebookService(config: LabConfig): ServiceDeclaration {
  const { runtime, host } = config;
  const jupyter = path.posix.join(runtime.venvDir, 'bin', 'jupyter');
  const environment: Record<string, string> = { HOME: host.home };
  if (runtime.libraryPath.length > 0) environment.LD_LIBRARY_PATH = runtime.libraryPath.join(':');
  return {
    name: serviceName(config, 'notebook'),
    description: 'labforge notebook server',
    command: `${jupyter} lab --ServerApp.token= --ServerApp.password= --ip=0.0.0.0 --port=${runtime.notebook.port} --no-browser`,
    after: [serviceName(config, 'provision')],
    afterPhase: PHASES.installRuntime,
    user: host.user,
    workingDirectory: host.home,
    environment,
    restart: 'on-failure',
    restartSec: config.services.restartSec,
    startNow: true
  };
}

/** Unit files of every service the plan registers. */
export function serviceUnits(config: LabConfig): string[] {
  const services = [provisionerService(config, {}), databaseService(config)];
  if (config.services.notebook) services.push(notebookService(config));
  return services.map((s) => unitFileName(s.name));
}

function prepareHost(config: LabConfig, host: HostCapabilities, opts: LabPlanOptions): Phase {
  const { packages } = config;
  return {
    id: PHASES.prepareHost,
    title: 'Prepare host',
    tolerateFailure: true,
    steps: [
      {
        id: 'grow-filesystem',
        failure: 'tolerable',
        retry: { maxAttempts: 1 },
        action: async ({ logger }) => {
          const result = await host.filesystem.grow();
          logger.info({ result }, 'filesystem.grow');
        }
      },
      {
        id: 'disable-repos',
        failure: 'tolerable',
        action: () => forEachItem(packages.disableRepos, (r) => r, (repo) => host.packages.disableRepo(repo))
      },
      {
        id: 'enable-repos',
        failure: 'tolerable',
        action: () => forEachItem(packages.enableRepos, (r) => r, (repo) => host.packages.enableRepo(repo))
      },
      {
        id: 'refresh-metadata',
        failure: 'tolerable',
        action: () => host.packages.refreshMetadata()
      },
      {
        id: 'register-provisioner',
        title: 'Register the boot-time provisioning service',
        action: () => opts.registrar.register(provisionerService(config, opts))
      }
    ]
  };
}

function installPackages(config: LabConfig, host: HostCapabilities): Phase {
  const engine = config.containerEngine;
  const owner = `${config.host.user}:${config.host.user}`;
  return {
    id: PHASES.installPackages,
    title: 'Install OS packages',
    dependsOn: [PHASES.prepareHost],
    steps: [
      {
        id: 'install-base-packages',
        action: () => host.packages.install(config.packages.base)
      },
      {
        id: 'verify-container-engine',
        retry: { maxAttempts: 1 },
        action: async () => {
          if (!(await host.packages.hasCommand(engine.binary))) {
            throw new PermanentError(`Container engine not found at ${engine.binary}`);
          }
        }
      },
      {
        id: 'configure-container-engine',
        action: async () => {
          fs.mkdirSync(path.dirname(engine.configPath), { recursive: true });
          fs.writeFileSync(engine.configPath, containerEngineConfig(config), 'utf8');
        }
      },
      {
        id: 'enable-firewall-service',
        failure: 'tolerable',
        action: async ({ logger }) => {
          if (!config.firewall.enabled) {
            logger.info('firewall.disabled');
            return;
          }
          await host.firewall.enable();
        }
      },
      {
        id: 'create-directories',
        action: async () => {
          const dirs = config.host.directories;
          if (dirs.length === 0) return;
          for (const dir of dirs) fs.mkdirSync(dir, { recursive: true });
          await runChecked(host.runner, 'chown', ['-R', owner, ...dirs]);
        }
      }
    ]
  };
}

function databaseCheck(config: LabConfig, host: HostCapabilities, pathExists: (p: string) => boolean) {
  const db = config.database;
  return {
    target: `container ${db.name}`,
    predicate: databaseReadiness(db, host.containers, pathExists),
    intervalMs: db.readyIntervalSec * 1000,
    timeoutMs: db.readyTimeoutSec * 1000,
    progressEvery: config.readiness.progressEvery
  };
}

function startDatabase(config: LabConfig, host: HostCapabilities, opts: LabPlanOptions, pathExists: (p: string) => boolean): Phase {
  const db = config.database;
  return {
    id: PHASES.startDatabase,
    title: 'Start database container',
    dependsOn: [PHASES.installPackages],
    steps: [
      {
        id: 'prepare-data-dir',
        failure: 'tolerable',
        action: async () => {
          fs.mkdirSync(db.dataDir, { recursive: true });
          await runChecked(host.runner, 'chown', ['-R', db.dataDirOwner, db.dataDir]);
        }
      },
      {
        id: 'pull-image',
        failure: 'tolerable',
        action: () => host.containers.pull(db.image)
      },
      {
        id: 'run-container',
        action: async () => {
          await host.containers.run({
            image: db.image,
            name: db.name,
            replace: true,
            network: 'host',
            env: {
              ORACLE_PWD: db.password,
              ORACLE_PDB: db.pdb,
              ORACLE_MEMORY: String(db.memoryMb)
            },
            volumes: [{ host: db.dataDir, container: '/opt/oracle/oradata', options: 'z' }]
          });
        }
      },
      {
        // The container has no restart policy of its own; the unit starts it at boot.
        id: 'register-database-service',
        action: () => opts.registrar.register(databaseService(config))
      },
      readinessStep('wait-for-database', databaseCheck(config, host, pathExists), {
        title: 'Wait for the database to accept work'
      })
    ]
  };
}

function configureDatabase(config: LabConfig, host: HostCapabilities, pathExists: (p: string) => boolean): Phase {
  const db = config.database;
  const sqlStep = (id: string, script: string): Step => ({
    id,
    failure: 'tolerable',
    toleratedSignals: db.toleratedSignals,
    retry: { maxAttempts: 2 },
    action: async () => {
      await runSql(host.containers, db, loadSql(script, db));
    }
  });

  return {
    id: PHASES.configureDatabase,
    title: 'Configure database',
    dependsOn: [PHASES.startDatabase],
    steps: [
      // A resumed run skips start-database. The steps below are tolerable, so a
      // stopped database has to fail the phase here.
      readinessStep('ensure-database', databaseCheck(config, host, pathExists), {
        title: 'Make sure the database container is up'
      }),
      sqlStep('open-pluggable-database', 'open-pdb'),
      readinessStep(
        'wait-for-listener',
        {
          target: `listener service ${db.pdb}`,
          predicate: listenerReadiness(db, host.containers),
          intervalMs: db.listenerIntervalSec * 1000,
          timeoutMs: db.listenerTimeoutSec * 1000,
          progressEvery: config.readiness.progressEvery
        },
        { failure: 'tolerable', toleratedSignals: db.toleratedSignals }
      ),
      sqlStep('create-tablespaces', 'create-tablespaces'),
      sqlStep('create-application-user', 'create-app-user'),
      sqlStep('set-vector-memory', 'vector-memory'),
      {
        id: 'verify-connectivity',
        failure: 'tolerable',
        toleratedSignals: db.toleratedSignals,
        retry: { maxAttempts: 2 },
        action: async () => {
          const output = await runSql(host.containers, db, loadSql('verify-connection', db), { connect: '/nolog' });
          if (!output.includes('CONNECTION_OK')) {
            throw new TransientError(`Application user ${db.appUser.name} could not query ${db.pdb}`);
          }
        }
      }
    ]
  };
}

function sourceBuildStep(build: SourceBuild, host: HostCapabilities, pathExists: (p: string) => boolean): Step {
  return {
    id: `build-${build.name}`,
    failure: 'tolerable',
    action: async ({ logger }) => {
      if (build.creates && pathExists(build.creates)) {
        logger.info({ build: build.name, creates: build.creates }, 'build.present');
        return;
      }
      const workDir = fs.mkdtempSync(path.join(os.tmpdir(), `labforge-${build.name}-`));
      try {
        const tarball = path.join(workDir, 'source.tar.gz');
        await runChecked(host.runner, 'curl', ['-fsSL', '-o', tarball, build.url]);
        await runChecked(host.runner, 'tar', ['-xzf', tarball, '-C', workDir, '--strip-components=1']);
        await runChecked(host.runner, './configure', [`--prefix=${build.prefix}`, ...build.configureArgs], { cwd: workDir });
        await runChecked(host.runner, 'make', ['-s'], { cwd: workDir });
        await runChecked(host.runner, 'make', ['install'], { cwd: workDir });
        logger.info({ build: build.name, prefix: build.prefix }, 'build.installed');
      } finally {
        fs.rmSync(workDir, { recursive: true, force: true });
      }
    }
  };
}

export function warmModelScript(model: string): string {
  return `from sentence_transformers import SentenceTransformer; SentenceTransformer(${JSON.stringify(model)})`;
}

function installRuntime(config: LabConfig, host: HostCapabilities, pathExists: (p: string) => boolean): Phase {
  const { runtime } = config;
  const notebook = { name: runtime.notebook.name, version: runtime.notebook.version };
  const activate = () => host.runtime.activate(runtime.pythonVersion);

  const verifyNotebook = async (binDir: string): Promise<boolean> => {
    const res = await host.userRunner(path.join(binDir, 'jupyter'), ['lab', '--version']);
    return res.ok;
  };

  const warmModels: Step = {
    id: 'warm-models',
    failure: 'tolerable',
    action: async ({ logger }) => {
      const { python } = await activate();
      await forEachItem(runtime.warmModels, (m) => m, async (model) => {
        await runChecked(host.userRunner, 'env', [...libraryPathAssignments(config), python, '-c', warmModelScript(model)]);
        logger.info({ model }, 'model.cached');
      });
    }
  };

  return {
    id: PHASES.installRuntime,
    title: 'Install runtime and libraries',
    dependsOn: [PHASES.installPackages],
    steps: [
      ...runtime.sourceBuilds.map((build) => sourceBuildStep(build, host, pathExists)),
      {
        id: 'create-environment',
        action: async ({ logger }) => {
          await host.runtime.install(runtime.pythonVersion);
          const env = await activate();
          logger.info({ version: env.version, binDir: env.binDir }, 'runtime.ready');
        }
      },
      {
        id: 'upgrade-tooling',
        failure: 'tolerable',
        action: async () => host.libraries((await activate()).binDir).upgradeTooling()
      },
      {
        id: 'install-libraries',
        action: async () => host.libraries((await activate()).binDir).install(runtime.libraries)
      },
      {
        id: 'install-notebook',
        action: async () => host.libraries((await activate()).binDir).install([notebook])
      },
      {
        id: 'verify-notebook',
        action: async ({ logger }) => {
          const { binDir } = await activate();
          if (await verifyNotebook(binDir)) return;
          logger.warn({ notebook: notebook.name }, 'notebook.reinstall');
          await host.libraries(binDir).install([notebook], { forceReinstall: true });
          if (!(await verifyNotebook(binDir))) {
            throw new TransientError(`${notebook.name} still does not start after a forced reinstall`);
          }
        }
      },
      {
        id: 'register-kernel',
        failure: 'tolerable',
        action: async () => {
          const { python } = await activate();
          await runChecked(host.userRunner, python, [
            '-m',
            'ipykernel',
            'install',
            '--user',
            '--name',
            runtime.notebook.kernelName,
            '--display-name',
            runtime.notebook.kernelDisplayName
          ]);
        }
      },
      ...(runtime.warmModels.length > 0 ? [warmModels] : []),
      ...runtime.toolInstallers.map(
        (tool): Step => ({
          id: `install-tool-${tool.name}`,
          failure: 'tolerable',
          action: async () => {
            const script = path.join(os.tmpdir(), `labforge-${tool.name}-install.sh`);
            await runChecked(host.userRunner, 'curl', ['-fsSL', '-o', script, tool.url]);
            await runChecked(host.userRunner, 'bash', [script, ...tool.args]);
          }
        })
      )
    ]
  };
}

function replaceSymlink(target: string, linkPath: string): void {
  const existing = fs.lstatSync(linkPath, { throwIfNoEntry: false });
  if (existing) {
    if (!existing.isSymbolicLink()) {
      throw new PermanentError(`${linkPath} exists and is not a symbolic link`);
    }
    fs.unlinkSync(linkPath);
  }
  fs.mkdirSync(path.dirname(linkPath), { recursive: true });
  fs.symlinkSync(target, linkPath);
}

function fetchContent(config: LabConfig, host: HostCapabilities): Phase {
  const { content } = config;
  const owner = `${config.host.user}:${config.host.user}`;
  return {
    id: PHASES.fetchContent,
    title: 'Fetch lab content',
    dependsOn: [PHASES.installPackages],
    tolerateFailure: true,
    steps: [
      ...content.sources.map(
        (source): Step => ({
          id: `fetch-${source.name}`,
          action: async ({ logger }) => {
            const result = await host.content.fetch(source, source.subsetPath, source.destination);
            logger.info({ source: source.name, method: result.method, files: result.files }, 'content.fetched');
          }
        })
      ),
      {
        id: 'write-seed-files',
        action: async () => {
          for (const file of config.seedFiles) {
            fs.mkdirSync(path.dirname(file.path), { recursive: true });
            fs.writeFileSync(file.path, file.content, 'utf8');
            if (file.mode) fs.chmodSync(file.path, parseInt(file.mode, 8));
          }
        }
      },
      {
        id: 'link-content',
        action: async () => {
          for (const link of content.links) replaceSymlink(link.target, link.path);
        }
      },
      {
        id: 'hand-over-content',
        failure: 'tolerable',
        action: async () => {
          const destinations = content.sources.map((s) => s.destination).filter((d) => fs.existsSync(d));
          if (destinations.length === 0) return;
          await runChecked(host.runner, 'chown', ['-R', owner, ...destinations]);
        }
      }
    ]
  };
}

function openFirewall(config: LabConfig, host: HostCapabilities): Phase {
  const { firewall } = config;
  const enabled = firewall.enabled && firewall.ports.length > 0;
  return {
    id: PHASES.openFirewall,
    title: 'Open firewall ports',
    tolerateFailure: true,
    steps: enabled ? [{ id: 'open-ports', action: () => host.firewall.openPorts(firewall.ports) }] : []
  };
}

function registerServices(config: LabConfig, opts: LabPlanOptions): Phase {
  const steps: Step[] = [];
  if (config.services.notebook) {
    steps.push({
      id: 'register-notebook-service',
      action: () => opts.registrar.register(notebookService(config))
    });
  }
  return {
    id: PHASES.registerServices,
    title: 'Register services',
    dependsOn: [PHASES.startDatabase, PHASES.installRuntime],
    steps
  };
}

export function buildLabPlan(config: LabConfig, host: HostCapabilities, opts: LabPlanOptions): Phase[] {
  const pathExists = opts.pathExists ?? fs.existsSync;
  return [
    prepareHost(config, host, opts),
    installPackages(config, host),
    startDatabase(config, host, opts, pathExists),
    configureDatabase(config, host, pathExists),
    installRuntime(config, host, pathExists),
    fetchContent(config, host),
    openFirewall(config, host),
    registerServices(config, opts)
  ];
}
