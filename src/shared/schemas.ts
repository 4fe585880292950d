import { z } from 'zod';

const SecretPath = z.string().min(1);
const Argv = z.array(z.string().min(1)).min(1);

export const PipelineConfigSchema = z.object({
  pipeline_id: z.string().min(1),
  registry: z.object({
    host: z.string().min(1).optional(),
    namespace: z.string().min(1),
    image: z.string().min(1),
    release_branch: z.string().min(1).default('main'),
    credentials: SecretPath.default('secret/ci/registry'),
  }),
  project: z
    .object({
      dir: z.string().default('.'),
      context: z.string().default('.'),
      dockerfile: z.string().default('Dockerfile'),
    })
    .default({}),
  test: z.object({
    command: Argv,
    report: z.string().min(1),
  }),
  lint: z
    .object({
      command: Argv,
    })
    .optional(),
  scan: z
    .object({
      enabled: z.boolean().default(true),
      bin: z.string().default('trivy'),
      source_severity: z.string().default('HIGH,CRITICAL'),
      image_severity: z.string().default('CRITICAL'),
    })
    .default({}),
  gitops: z.object({
    repo_url: z.string().min(1),
    branch: z.string().min(1).default('main'),
    manifest_path: z.string().min(1),
    clone_dir: z.string().optional(),
    credentials: SecretPath.default('secret/ci/git'),
    author_name: z.string().default('tagflow'),
    author_email: z.string().default('tagflow@localhost'),
  }),
  timeouts: z
    .object({
      stage_seconds: z.number().int().positive().default(900),
      network_attempts: z.number().int().positive().default(3),
      retry_delay_ms: z.number().int().nonnegative().default(2000),
    })
    .default({}),
  vault: z
    .object({
      provider: z.enum(['dev', 'file', 'hashicorp']).default('file'),
      address: z.string().optional(),
      mount: z.string().optional(),
    })
    .default({}),
});

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
