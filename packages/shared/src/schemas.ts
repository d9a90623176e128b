import { z } from 'zod';
import type { ContainerSpec, MountPoint, Volume } from './types.js';

/** Volume name reserved for the scratch disk every job definition mounts. */
export const SCRATCH_VOLUME = 'scratch';

const volumeName = z
  .string()
  .min(1, 'volume name is required')
  .max(255)
  .regex(/^[A-Za-z0-9_-]+$/, 'volume names may contain letters, numbers, hyphens and underscores');

const absolutePath = z
  .string()
  .min(1)
  .refine((value) => value.startsWith('/'), { message: 'must be an absolute path' });

export const mountPointSchema = z.object({
  containerPath: absolutePath,
  readOnly: z.boolean().default(false),
  sourceVolume: volumeName,
}) satisfies z.ZodType<MountPoint, z.ZodTypeDef, unknown>;

export const volumeSchema = z.object({
  name: volumeName,
  sourcePath: absolutePath,
}) satisfies z.ZodType<Volume, z.ZodTypeDef, unknown>;

export const containerSpecSchema = z
  .object({
    image: z.string().min(1, 'container image is required'),
    mountPoints: z.array(mountPointSchema).default([]),
    volumes: z.array(volumeSchema).default([]),
    sharedMemorySize: z.number().int().positive().optional(),
  })
  .superRefine((spec, ctx) => {
    const declared = new Set([SCRATCH_VOLUME, ...spec.volumes.map((v) => v.name)]);
    const seen = new Set<string>();
    spec.volumes.forEach((volume, i) => {
      if (volume.name === SCRATCH_VOLUME || seen.has(volume.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `volume '${volume.name}' is declared more than once`,
          path: ['volumes', i, 'name'],
        });
      }
      seen.add(volume.name);
    });
    spec.mountPoints.forEach((mount, i) => {
      if (!declared.has(mount.sourceVolume)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `mount references undeclared volume '${mount.sourceVolume}'`,
          path: ['mountPoints', i, 'sourceVolume'],
        });
      }
    });
  }) satisfies z.ZodType<ContainerSpec, z.ZodTypeDef, unknown>;

/** Render zod issues as `path: message` pairs. */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
}
