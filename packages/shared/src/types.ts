// --- Task model (owned by the workflow engine) ---

export type TaskStatus = 'pending' | 'submitted' | 'running' | 'succeeded' | 'failed' | 'killed';

export interface MountPoint {
  /** Absolute path inside the container */
  containerPath: string;
  readOnly: boolean;
  /** Name of a volume declared in the same container spec */
  sourceVolume: string;
}

export interface Volume {
  name: string;
  /** Host path backing the volume */
  sourcePath: string;
}

export interface ContainerSpec {
  image: string;
  mountPoints: MountPoint[];
  volumes: Volume[];
  /** Shared memory size in MiB */
  sharedMemorySize?: number;
}

export interface BatchTask {
  /** Unique task identifier within the workflow */
  uid: string;
  /** Logical stage the task belongs to */
  stageName: string;
  queue?: string;
  cpuReq?: number;
  /** Memory request in MiB */
  memReq?: number;
  gpuReq?: number;
  environment: Record<string, string>;
  container: ContainerSpec;
  instanceType?: string;
  /** s3:// prefix, without trailing slash, where command scripts are staged */
  scriptPrefix: string;
  /** Leave the staged script in S3 after cleanup */
  keepCommandScript?: boolean;
  commandScriptPath: string;
  stdoutPath: string;
  stderrPath: string;

  // Written by the driver
  status: TaskStatus;
  jobId?: string;
  scriptUri?: string;
  jobDefinitionArn?: string;
}

// --- Remote job read model ---

export type RemoteStatus = 'queued' | 'running' | 'succeeded' | 'failed';

export interface RemoteAttempt {
  statusReason?: string;
  exitCode?: number;
  containerReason?: string;
}

export interface RemoteJobRecord {
  jobId: string;
  status: RemoteStatus;
  rawStatus: string;
  /** Undefined when the service sent no attempt list at all */
  attempts?: RemoteAttempt[];
  logStreamName?: string;
  /** Epoch milliseconds */
  startedAt?: number;
  stoppedAt?: number;
}

export interface TaskOutcome {
  status: 'succeeded' | 'failed';
  exitStatus: number;
  /** Whole seconds between start and stop */
  wallTime: number;
  statusReason: string | null;
}

export interface StagedScript {
  bucket: string;
  key: string;
  uri: string;
}
