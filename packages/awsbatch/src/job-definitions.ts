import {
  RegisterJobDefinitionCommand,
  DeregisterJobDefinitionCommand,
  type BatchClient,
  type ContainerProperties,
  type RegisterJobDefinitionCommandOutput,
} from '@aws-sdk/client-batch';
import {
  logger,
  ConfigurationError,
  SCRATCH_VOLUME,
  type ContainerSpec,
  type MountPoint,
  type Volume,
} from '@batchrun/shared';
import { assertApiSuccess, requireField } from './responses.js';
import { jobDefinitionName } from './job-name.js';

const log = logger.child({ module: 'job-definitions' });

const SCRATCH_MOUNT: MountPoint = { containerPath: '/scratch', readOnly: false, sourceVolume: SCRATCH_VOLUME };
const SCRATCH_HOST_VOLUME: Volume = { name: SCRATCH_VOLUME, sourcePath: '/scratch' };

/** Submissions always override the command; this one only satisfies the API. */
const PLACEHOLDER_COMMAND = 'user-should-override-this';

export interface JobDefinitionEntry {
  image: string;
  arn: string;
  /** Canonical form of the spec the definition was registered with */
  specKey: string;
}

interface CacheSlot {
  specKey: string;
  pending: Promise<string>;
  arn?: string;
}

function sortedByJson<T>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => JSON.stringify(a).localeCompare(JSON.stringify(b)));
}

/** Order-insensitive key for (image, mounts, volumes, shm size). */
export function containerSpecKey(spec: ContainerSpec): string {
  return JSON.stringify({
    image: spec.image,
    mountPoints: sortedByJson(
      spec.mountPoints.map((m) => ({ c: m.containerPath, r: m.readOnly, s: m.sourceVolume })),
    ),
    volumes: sortedByJson(spec.volumes.map((v) => ({ n: v.name, p: v.sourcePath }))),
    shm: spec.sharedMemorySize ?? null,
  });
}

export function buildContainerProperties(spec: ContainerSpec, jobRoleArn?: string): ContainerProperties {
  const properties: ContainerProperties = {
    image: spec.image,
    mountPoints: [SCRATCH_MOUNT, ...spec.mountPoints].map((m) => ({
      containerPath: m.containerPath,
      readOnly: m.readOnly,
      sourceVolume: m.sourceVolume,
    })),
    volumes: [SCRATCH_HOST_VOLUME, ...spec.volumes].map((v) => ({
      name: v.name,
      host: { sourcePath: v.sourcePath },
    })),
    command: ['bash', '-c', PLACEHOLDER_COMMAND],
    resourceRequirements: [
      { type: 'VCPU', value: '1' },
      { type: 'MEMORY', value: '100' },
    ],
    privileged: true,
  };
  if (jobRoleArn) {
    properties.jobRoleArn = jobRoleArn;
  }
  if (spec.sharedMemorySize) {
    properties.linuxParameters = { sharedMemorySize: spec.sharedMemorySize };
  }
  return properties;
}

function isClientException(err: unknown): boolean {
  return err instanceof Error && err.name === 'ClientException';
}

export interface JobDefinitionRegistryOptions {
  namePrefix: string;
  jobRoleArn?: string;
}

/**
 * One job definition per container image for the lifetime of the registry.
 *
 * The cache holds the registration promise, so concurrent callers for the same
 * image await one remote call while other images proceed independently.
 */
export class JobDefinitionRegistry {
  private readonly slots = new Map<string, CacheSlot>();
  private readonly batch: BatchClient;
  private readonly options: JobDefinitionRegistryOptions;

  constructor(batch: BatchClient, options: JobDefinitionRegistryOptions) {
    this.batch = batch;
    this.options = options;
  }

  async getOrRegister(spec: ContainerSpec, nameHint: string): Promise<string> {
    const specKey = containerSpecKey(spec);
    const existing = this.slots.get(spec.image);
    if (existing) {
      if (existing.specKey !== specKey) {
        log.warn(
          { image: spec.image },
          'image already has a job definition with different mounts/volumes; reusing it',
        );
      }
      return existing.pending;
    }

    const slot: CacheSlot = { specKey, pending: this.register(spec, nameHint) };
    this.slots.set(spec.image, slot);
    try {
      slot.arn = await slot.pending;
      return slot.arn;
    } catch (err) {
      // Let a later call try again
      this.slots.delete(spec.image);
      throw err;
    }
  }

  private async register(spec: ContainerSpec, nameHint: string): Promise<string> {
    const { name, shared } = jobDefinitionName(this.options.namePrefix, nameHint);
    log.info({ image: spec.image, jobDefinitionName: name, shared }, 'registering job definition');

    let response: RegisterJobDefinitionCommandOutput;
    try {
      response = await this.batch.send(
        new RegisterJobDefinitionCommand({
          jobDefinitionName: name,
          type: 'container',
          containerProperties: buildContainerProperties(spec, this.options.jobRoleArn),
        }),
      );
    } catch (err) {
      if (shared && isClientException(err)) {
        throw new ConfigurationError(
          `job definition '${name}' could not be registered for image ${spec.image}; ` +
            'the shared name is taken by an incompatible definition. Use a shorter task uid.',
          err,
        );
      }
      throw err;
    }

    assertApiSuccess('RegisterJobDefinition', response);
    const arn = requireField('RegisterJobDefinition', 'jobDefinitionArn', response.jobDefinitionArn);
    log.info({ image: spec.image, arn }, 'job definition registered');
    return arn;
  }

  /** Definitions whose registration has completed. */
  entries(): JobDefinitionEntry[] {
    const out: JobDefinitionEntry[] = [];
    for (const [image, slot] of this.slots) {
      if (slot.arn) out.push({ image, arn: slot.arn, specKey: slot.specKey });
    }
    return out;
  }

  /** Deregister every cached definition and empty the cache. */
  async deregisterAll(): Promise<void> {
    // A failed registration was already reported to its caller and left nothing to deregister.
    const pending = [...this.slots.values()].map((slot) => slot.pending.catch(() => undefined));
    const arns = (await Promise.all(pending)).filter((arn): arn is string => arn !== undefined);
    this.slots.clear();

    for (const arn of arns) {
      const response = await this.batch.send(new DeregisterJobDefinitionCommand({ jobDefinition: arn }));
      assertApiSuccess('DeregisterJobDefinition', response);
      log.info({ arn }, 'job definition deregistered');
    }
  }
}
