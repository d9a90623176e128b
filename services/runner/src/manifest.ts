import { readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { z } from 'zod';
import { containerSpecSchema, formatIssues, type BatchTask } from '@batchrun/shared';

const environmentSchema = z.record(z.string(), z.string());

const resourceFields = {
  queue: z.string().min(1).optional(),
  cpuReq: z.number().positive().optional(),
  memReq: z.number().int().positive().optional(),
  gpuReq: z.number().int().nonnegative().optional(),
  instanceType: z.string().min(1).optional(),
  keepCommandScript: z.boolean().optional(),
};

const taskEntrySchema = z.object({
  uid: z.string().min(1),
  stageName: z.string().min(1),
  /** Path to the command script, relative to the manifest */
  script: z.string().min(1),
  environment: environmentSchema.default({}),
  container: containerSpecSchema.optional(),
  ...resourceFields,
});

export const manifestSchema = z
  .object({
    scriptPrefix: z
      .string()
      .startsWith('s3://', 'scriptPrefix must be an s3:// URI')
      .refine((value) => !value.endsWith('/'), { message: 'scriptPrefix must not end with /' }),
    /** Where per-task stdout/stderr files go, relative to the manifest */
    outputDir: z.string().min(1).default('batchrun-out'),
    defaults: z
      .object({
        environment: environmentSchema.default({}),
        container: containerSpecSchema.optional(),
        ...resourceFields,
      })
      .default({}),
    tasks: z.array(taskEntrySchema).min(1, 'manifest must list at least one task'),
  })
  .superRefine((manifest, ctx) => {
    const seen = new Set<string>();
    manifest.tasks.forEach((task, i) => {
      if (seen.has(task.uid)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate task uid '${task.uid}'`, path: ['tasks', i, 'uid'] });
      }
      seen.add(task.uid);
      if (!task.container && !manifest.defaults.container) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'task has no container and the manifest has no default container',
          path: ['tasks', i, 'container'],
        });
      }
    });
  });

export type Manifest = z.infer<typeof manifestSchema>;

function outputDirName(uid: string): string {
  return uid.replace(/[^A-Za-z0-9._-]/g, '_');
}

/** Validate a parsed manifest document and expand it into pending tasks. */
export function parseManifest(input: unknown, baseDir: string): BatchTask[] {
  const parsed = manifestSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`invalid manifest: ${formatIssues(parsed.error)}`);
  }
  const manifest = parsed.data;
  const { defaults } = manifest;
  const outputDir = resolve(baseDir, manifest.outputDir);

  return manifest.tasks.map((entry): BatchTask => {
    const container = entry.container ?? defaults.container;
    if (!container) {
      // superRefine has already rejected this; keeps the type narrow
      throw new Error(`task ${entry.uid} has no container`);
    }
    const taskDir = join(outputDir, outputDirName(entry.uid));
    return {
      uid: entry.uid,
      stageName: entry.stageName,
      queue: entry.queue ?? defaults.queue,
      cpuReq: entry.cpuReq ?? defaults.cpuReq,
      memReq: entry.memReq ?? defaults.memReq,
      gpuReq: entry.gpuReq ?? defaults.gpuReq,
      instanceType: entry.instanceType ?? defaults.instanceType,
      keepCommandScript: entry.keepCommandScript ?? defaults.keepCommandScript,
      environment: { ...defaults.environment, ...entry.environment },
      container,
      scriptPrefix: manifest.scriptPrefix,
      commandScriptPath: resolve(baseDir, entry.script),
      stdoutPath: join(taskDir, 'stdout.txt'),
      stderrPath: join(taskDir, 'stderr.txt'),
      status: 'pending',
    };
  });
}

export async function loadManifest(path: string): Promise<BatchTask[]> {
  const raw = await readFile(path, 'utf-8');
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new Error(`manifest ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseManifest(document, dirname(resolve(path)));
}
