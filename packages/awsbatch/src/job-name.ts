import { InvalidArgumentError } from '@batchrun/shared';

/** AWS Batch limit for job and job definition names. */
export const MAX_NAME_LENGTH = 128;

const VALID_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

function clean(part: string): string {
  return part.replace(/\//g, '__').replace(/:/g, '');
}

export function isValidJobName(name: string): boolean {
  return name.length <= MAX_NAME_LENGTH && VALID_NAME.test(name);
}

export function validateJobName(name: string): string {
  if (!isValidJobName(name)) {
    throw new InvalidArgumentError(
      `'${name}' is not a valid job name: it must start with a letter or digit and contain up to ` +
        `${MAX_NAME_LENGTH} letters, numbers, hyphens and underscores`,
    );
  }
  return name;
}

/**
 * `<prefix>__<user>__<stage>__<uid>`, with `/` spelled `__` and `:` dropped,
 * cut to the service's length limit.
 */
export function buildJobName(prefix: string, user: string, stageName: string, uid: string): string {
  const name = `${prefix}__${user}__${clean(stageName)}__${clean(uid)}`.slice(0, MAX_NAME_LENGTH);
  return validateJobName(name);
}

/** Stage name as it appears in the `stage_name` tag. */
export function stageTag(stageName: string): string {
  return clean(stageName);
}

/**
 * Job definition name for a registration. Falls back to `shared` when the
 * derived name would exceed the length limit.
 */
export function jobDefinitionName(prefix: string, hint: string): { name: string; shared: boolean } {
  const derived = `${prefix}_base_jobdef_${hint.replace(/[^A-Za-z0-9_-]/g, '_')}`;
  if (derived.length <= MAX_NAME_LENGTH) {
    return { name: derived, shared: false };
  }
  return { name: `${prefix}_base_job_definition`, shared: true };
}
