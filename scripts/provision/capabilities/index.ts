import { runAsUser, type CommandRunner } from '../../lib/process.js';
import type { LabConfig } from '../../schemas/lab-config.zod.js';
import { PodmanRuntime, type ContainerRuntime } from './container.js';
import { GitContentFetcher, type ContentFetcher } from './content.js';
import { GrowfsCommand, type FilesystemGrower } from './filesystem.js';
import { FirewalldFirewall, type Firewall } from './firewall.js';
import { PipLibraryInstaller, type PackageLibraryInstaller } from './libraries.js';
import { DnfPackageInstaller, type PackageInstaller } from './packages.js';
import { VenvRuntimeManager, type RuntimeVersionManager } from './runtime.js';
import { SystemdSupervisor, type ServiceSupervisor } from './supervisor.js';

export type HostCapabilities = {
  /** Runs as root. */
  runner: CommandRunner;
  /** Runs as the lab user. */
  userRunner: CommandRunner;
  packages: PackageInstaller;
  containers: ContainerRuntime;
  runtime: RuntimeVersionManager;
  libraries: (binDir: string) => PackageLibraryInstaller;
  content: ContentFetcher;
  firewall: Firewall;
  filesystem: FilesystemGrower;
  supervisor: ServiceSupervisor;
};

export function createHostCapabilities(config: LabConfig, runner: CommandRunner): HostCapabilities {
  const userRunner = runAsUser(runner, config.host.user, config.host.home);
  return {
    runner,
    userRunner,
    packages: new DnfPackageInstaller(runner),
    containers: new PodmanRuntime(runner, config.containerEngine.binary),
    runtime: new VenvRuntimeManager(userRunner, config.runtime.venvDir),
    libraries: (binDir) => new PipLibraryInstaller(userRunner, binDir),
    content: new GitContentFetcher(runner),
    firewall: new FirewalldFirewall(runner, config.firewall.zone),
    filesystem: new GrowfsCommand(runner, config.filesystem.growCommand),
    supervisor: new SystemdSupervisor(runner, config.paths.unitDir)
  };
}

export type { ContainerRuntime, HealthStatus, ContainerSpec } from './container.js';
export type { ContentFetcher, FetchResult } from './content.js';
export type { FilesystemGrower } from './filesystem.js';
export type { Firewall } from './firewall.js';
export type { PackageLibraryInstaller } from './libraries.js';
export type { PackageInstaller } from './packages.js';
export type { RuntimeVersionManager, RuntimeEnvironment } from './runtime.js';
export type { ServiceSupervisor, ServiceState } from './supervisor.js';
