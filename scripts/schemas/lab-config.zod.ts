/**
 * Zod schema for `lab.config.yml`.
 *
 * Every section except `packages`, `database` and `runtime` can be omitted;
 * defaults describe the stock appliance. Secrets are referenced as `$VAR`
 * and resolved from the environment or the `.env` file next to the config.
 */
import { z } from 'zod';

const PathsSchema = z
  .object({
    // Marker store (one JSON document holding every completed phase).
    stateFile: z.string().default('/var/lib/labforge/state.json'),
    // Append-only audit log (JSON lines).
    logFile: z.string().default('/var/log/labforge.log'),
    unitDir: z.string().default('/etc/systemd/system'),
    // Command generated units use to call back into labforge.
    cli: z.string().default('/usr/local/bin/labforge')
  })
  .default({});

const HostSchema = z
  .object({
    user: z.string().default('opc'),
    home: z.string().default('/home/opc'),
    // Created and handed to `user` during package installation.
    directories: z.array(z.string()).default([])
  })
  .default({});

const RetrySchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(5),
    baseDelaySec: z.number().min(0).default(5)
  })
  .default({});

const ReadinessSchema = z
  .object({
    // Emit a progress line every N polls of a readiness wait.
    progressEvery: z.number().int().min(1).default(12),
    awaitPhaseTimeoutSec: z.number().positive().default(7200),
    awaitPhaseIntervalSec: z.number().positive().default(5)
  })
  .default({});

const FilesystemSchema = z
  .object({
    growCommand: z.string().default('/usr/libexec/oci-growfs')
  })
  .default({});

const PackagesSchema = z.object({
  enableRepos: z.array(z.string()).default([]),
  disableRepos: z.array(z.string()).default([]),
  base: z.array(z.string()).min(1)
});

const ContainerEngineSchema = z
  .object({
    binary: z.string().default('/usr/bin/podman'),
    configPath: z.string().default('/etc/containers/containers.conf'),
    cgroupManager: z.string().default('cgroupfs'),
    eventsLogger: z.string().default('file')
  })
  .default({});

const DatabaseSchema = z.object({
  image: z.string().min(1),
  name: z.string().default('lab-db'),
  password: z.string().min(1),
  pdb: z.string().default('FREEPDB1'),
  memoryMb: z.number().int().positive().default(2048),
  dataDir: z.string().min(1),
  dataDirOwner: z.string().default('54321:54321'),
  // Present under dataDir once the database has been created at least once.
  persistedDataSubdir: z.string().default('FREE'),
  // Sourced inside the container before sqlplus/lsnrctl.
  shellProfile: z.string().default('/home/oracle/.bashrc'),
  listenerPort: z.number().int().min(1).max(65535).default(1521),
  readyLogLine: z.string().default('DATABASE IS READY TO USE!'),
  readyTimeoutSec: z.number().positive().default(900),
  readyIntervalSec: z.number().positive().default(5),
  listenerTimeoutSec: z.number().positive().default(180),
  listenerIntervalSec: z.number().positive().default(3),
  vectorMemory: z.string().default('512M'),
  appUser: z.object({
    name: z.string().default('vector'),
    password: z.string().min(1)
  }),
  // Regular expressions for collaborator output known to be harmless.
  toleratedSignals: z.array(z.string()).default([])
});

const LibrarySchema = z.object({
  name: z.string().min(1),
  version: z.string().optional()
});

const ToolInstallerSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  args: z.array(z.string()).default([])
});

// A native library built from a source tarball (configure, make, make install).
const SourceBuildSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'use lowercase letters, digits and dashes'),
  url: z.string().url(),
  prefix: z.string().default('/usr/local'),
  configureArgs: z.array(z.string()).default([]),
  // The build is skipped while this file exists.
  creates: z.string().optional()
});

const RuntimeSchema = z.object({
  pythonVersion: z.string().default('3.9'),
  venvDir: z.string().min(1),
  sourceBuilds: z.array(SourceBuildSchema).default([]),
  // Prepended to LD_LIBRARY_PATH for the notebook server and model warm-up.
  libraryPath: z.array(z.string()).default([]),
  libraries: z.array(LibrarySchema).default([]),
  // sentence-transformers models downloaded ahead of the first lab.
  warmModels: z.array(z.string().min(1)).default([]),
  notebook: z
    .object({
      name: z.string().default('jupyterlab'),
      version: z.string().optional(),
      port: z.number().int().min(1).max(65535).default(8888),
      kernelName: z.string().default('python3'),
      kernelDisplayName: z.string().default('Python 3 (ipykernel)')
    })
    .default({}),
  toolInstallers: z.array(ToolInstallerSchema).default([])
});

const ContentSourceSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'use lowercase letters, digits and dashes'),
  repository: z.string().min(1),
  ref: z.string().default('main'),
  // Directory inside the repository; empty means the whole tree.
  subsetPath: z.string().default(''),
  destination: z.string().min(1),
  archiveUrl: z.string().url().optional()
});

const ContentSchema = z
  .object({
    sources: z.array(ContentSourceSchema).default([]),
    links: z.array(z.object({ target: z.string(), path: z.string() })).default([])
  })
  .default({});

const SeedFileSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
  mode: z
    .string()
    .regex(/^[0-7]{3,4}$/)
    .optional()
});

const FirewallSchema = z
  .object({
    enabled: z.boolean().default(true),
    zone: z.string().default('public'),
    ports: z.array(z.number().int().min(1).max(65535)).default([])
  })
  .default({});

const ServicesSchema = z
  .object({
    prefix: z.string().default('labforge'),
    notebook: z.boolean().default(true),
    restartSec: z.number().int().min(0).default(10)
  })
  .default({});

export const LabConfigSchema = z.object({
  paths: PathsSchema,
  host: HostSchema,
  retry: RetrySchema,
  readiness: ReadinessSchema,
  filesystem: FilesystemSchema,
  packages: PackagesSchema,
  containerEngine: ContainerEngineSchema,
  database: DatabaseSchema,
  runtime: RuntimeSchema,
  content: ContentSchema,
  seedFiles: z.array(SeedFileSchema).default([]),
  firewall: FirewallSchema,
  services: ServicesSchema
});

export type LabConfig = z.infer<typeof LabConfigSchema>;
export type LabConfigInput = z.input<typeof LabConfigSchema>;
export type LibrarySpec = z.infer<typeof LibrarySchema>;
export type SourceBuild = z.infer<typeof SourceBuildSchema>;
